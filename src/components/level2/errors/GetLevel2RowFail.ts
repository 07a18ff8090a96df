import {DatabaseError} from '../../../errors/DatabaseError';

export class GetLevel2RowFail extends DatabaseError {

  public constructor(message = 'Failed to get level 2 row', privateMessage?: string) {
    super(message, privateMessage); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
