import {OperationalError} from './OperationalError';

export class Conflict extends OperationalError {

  public constructor(message = 'Resource conflict') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
