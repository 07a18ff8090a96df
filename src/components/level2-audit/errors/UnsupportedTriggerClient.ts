import {OperationalError} from '../../../errors/OperationalError';

export class UnsupportedTriggerClient extends OperationalError {

  public constructor(message = 'The delete trigger can not be installed on this database client') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
