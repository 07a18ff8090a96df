//-------------------------------------------------
// Dependencies
//-------------------------------------------------
import * as joi from 'joi';


//-------------------------------------------------
// Validation Schema
//-------------------------------------------------
export type DbClient = 'pg' | 'mysql2' | 'better-sqlite3';

interface DbEnv {
  DB_CLIENT: DbClient;
  DB_HOST?: string;
  DB_PORT?: number;
  DB_USER?: string;
  DB_PASSWORD?: string;
  DB_NAME?: string;
  DB_SSL: boolean;
  DB_FILENAME: string;
}

const serverClients = ['pg', 'mysql2'];

const schema = joi.object<DbEnv>({
  DB_CLIENT: joi.string()
    .valid('pg', 'mysql2', 'better-sqlite3')
    .default('pg'),
  // Server connection details are only needed when we're not using an embedded SQLite file.
  DB_HOST: joi.string()
    .when('DB_CLIENT', {is: joi.valid(...serverClients), then: joi.required()}),
  DB_PORT: joi.number()
    .port()
    .when('DB_CLIENT', {is: joi.valid(...serverClients), then: joi.required()}),
  DB_USER: joi.string()
    .when('DB_CLIENT', {is: joi.valid(...serverClients), then: joi.required()}),
  DB_PASSWORD: joi.string()
    .when('DB_CLIENT', {is: joi.valid(...serverClients), then: joi.required()}),
  DB_NAME: joi.string()
    .default('weather_db'),
  DB_SSL: joi.boolean()
    .default(false),
  DB_FILENAME: joi.string()
    .default(':memory:')
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
export const db = {
  client: envVars.DB_CLIENT,
  host: envVars.DB_HOST,
  port: envVars.DB_PORT,
  user: envVars.DB_USER,
  password: envVars.DB_PASSWORD,
  name: envVars.DB_NAME,
  ssl: envVars.DB_SSL,
  filename: envVars.DB_FILENAME
};
