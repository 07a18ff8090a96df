import {DatabaseError} from '../../../errors/DatabaseError';

export class CreateLevel2RowFail extends DatabaseError {

  public constructor(message = 'Failed to create level 2 row', privateMessage?: string) {
    super(message, privateMessage); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
