//-------------------------------------------------
// Dependencies
//-------------------------------------------------
import {config} from './config';
import {logger} from './utils/logger';
// Handle Uncaught Errors - Make sure the logger is already configured first.
import './utils/handle-uncaught-errors';
import {initialiseDb} from './db/initialise-db';
import {knex} from './db/knex';


//-------------------------------------------------
// Logging
//-------------------------------------------------
logger.info(`${config.common.appName} instance starting (audit mode: ${config.audit.mode})`);


//-------------------------------------------------
// Shutdown
//-------------------------------------------------
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, closing database connections.`);
  await knex.destroy();
  process.exit(0);
}

process.once('SIGTERM', (): void => {
  shutdown('SIGTERM').catch((err): void => {
    logger.error({err}, 'Failed to shut down cleanly');
    process.exit(1);
  });
});


//-------------------------------------------------
// Database
//-------------------------------------------------
async function start(): Promise<void> {
  await initialiseDb();
  logger.info('Database has been initialised');
}

start().catch((err): void => {
  logger.fatal({err}, 'Failed to initialise the database');
  process.exit(1);
});
