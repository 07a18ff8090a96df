import {DatabaseError} from '../../../errors/DatabaseError';

// Raised when the audit rows for a deletion can't be written. The deletion itself must then fail too.
export class AuditWriteFail extends DatabaseError {

  public constructor(message = 'Failed to write the audit entries, the row has not been deleted.', privateMessage?: string) {
    super(message, privateMessage); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
