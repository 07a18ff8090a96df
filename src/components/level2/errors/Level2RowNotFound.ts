import {NotFound} from '../../../errors/NotFound';

export class Level2RowNotFound extends NotFound {

  public constructor(message = 'Level 2 row could not be found') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
