import {DatabaseError} from '../../../errors/DatabaseError';

export class DeleteLevel2RowFail extends DatabaseError {

  public constructor(message = 'Failed to delete level 2 row', privateMessage?: string) {
    super(message, privateMessage); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
