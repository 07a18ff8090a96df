import {knex as knexFactory, Knex} from 'knex';
import {config} from '../config';


export function buildKnexConfig(dbConfig: typeof config.db): Knex.Config {

  if (dbConfig.client === 'better-sqlite3') {
    return {
      client: 'better-sqlite3',
      connection: {
        filename: dbConfig.filename
      },
      useNullAsDefault: true,
      pool: {
        // An in-memory database only lives as long as its connection, so there must only ever be the one.
        min: 1,
        max: 1
      }
    };
  }

  return {
    client: dbConfig.client,
    connection: {
      host: dbConfig.host,
      user: dbConfig.user,
      port: dbConfig.port,
      password: dbConfig.password,
      database: dbConfig.name,
      ssl: dbConfig.ssl
    },
    pool: {
      min: 2,
      max: 15 // default is 10.
    }
  };

}


export const knex: Knex = knexFactory(buildKnexConfig(config.db));


// The client name the given knex instance was actually built with, so raw SQL always matches the connection it runs on.
export function clientName(db: Knex): string {
  const client: unknown = db.client.config.client;
  if (typeof client !== 'string') {
    throw new Error('Only knex instances configured with a client name are supported');
  }
  return client;
}
