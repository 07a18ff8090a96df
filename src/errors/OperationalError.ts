// Operational errors are the ones we expect to happen from time to time (e.g. a missing row), and whose message is safe to pass back to the caller.
export class OperationalError extends Error {

  public constructor(message = 'Operational Error') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
    this.name = new.target.name;
  }

}
