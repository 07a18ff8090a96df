import {Conflict} from '../../../errors/Conflict';

export class Level2RowAlreadyExists extends Conflict {

  public constructor(message = 'Level 2 row already exists') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
