import {BadRequest} from '../../../errors/BadRequest';

export class InvalidDeleteRequest extends BadRequest {

  public constructor(message = 'Invalid delete request') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
