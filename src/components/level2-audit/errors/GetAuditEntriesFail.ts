import {DatabaseError} from '../../../errors/DatabaseError';

export class GetAuditEntriesFail extends DatabaseError {

  public constructor(message = 'Failed to get audit entries', privateMessage?: string) {
    super(message, privateMessage); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
