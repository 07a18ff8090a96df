import {OperationalError} from './OperationalError';

export class BadRequest extends OperationalError {

  public constructor(message = 'Bad request') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
