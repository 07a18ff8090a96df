import {OperationalError} from '../errors/OperationalError';
import {UnexpectedError} from '../errors/UnexpectedError';
import {DatabaseError} from '../errors/DatabaseError';
import {logger} from './logger';

export function logCensorAndRethrow(operationName: string, err: unknown): never {

  //------------------------
  // Operational Errors
  //------------------------
  if (err instanceof OperationalError) {

    if (err instanceof DatabaseError) {
      logger.error({err, privateMessage: err.privateMessage}, `Database error whilst handling ${operationName}.`);
    } else {
      // For example if a caller requests a row with the wrong ID I only want a 'warn' not a full 'error'.
      logger.warn({err}, `Operational error whilst handling ${operationName}.`);
    }
    throw err;

  //------------------------
  // Programmer Errors
  //------------------------
  } else {
    logger.error({err}, `Unexpected error whilst handling ${operationName}.`);
    // We don't want callers to see programmer errors.
    throw new UnexpectedError();

  }

}
