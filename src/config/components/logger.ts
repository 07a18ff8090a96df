//-------------------------------------------------
// Dependencies
//-------------------------------------------------
import * as joi from 'joi';


//-------------------------------------------------
// Validation Schema
//-------------------------------------------------
interface LoggerEnv {
  LOGGER_LEVEL: string;
  LOGGER_FORMAT: 'json' | 'terminal';
  LOGGER_FILE?: string;
}

const schema = joi.object<LoggerEnv>({
  LOGGER_LEVEL: joi.string()
    .valid('fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent')
    .default('info'),
  LOGGER_FORMAT: joi.string()
    .valid('json', 'terminal')
    .default('json'),
  // When set the logs go to this file (e.g. the mounted logs directory) rather than stdout.
  LOGGER_FILE: joi.string()
}).unknown()
  .required();


//-------------------------------------------------
// Validate
//-------------------------------------------------
const result = schema.validate(process.env);

if (result.error) {
  throw new Error(`An error occured whilst validating process.env: ${result.error.message}`);
}

const envVars = result.value;


//-------------------------------------------------
// Create config object
//-------------------------------------------------
export const logger = {
  level: envVars.LOGGER_LEVEL,
  format: envVars.LOGGER_FORMAT,
  file: envVars.LOGGER_FILE
};
