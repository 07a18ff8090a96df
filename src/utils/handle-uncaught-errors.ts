import {logger} from './logger';

process.on('uncaughtException', (err): void => {
  logger.fatal({err}, 'Uncaught exception, shutting down.');
  process.exit(1);
});

process.on('unhandledRejection', (reason): void => {
  logger.fatal({err: reason}, 'Unhandled promise rejection, shutting down.');
  process.exit(1);
});
