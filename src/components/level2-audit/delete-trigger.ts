import {Knex} from 'knex';
import {knex, clientName} from '../../db/knex';
import {tables} from '../../db/tables';
import {isSqliteClient, quoteIdentifier, quoteLiteral} from '../../db/db-helpers';
import {trackedFields, TrackedField} from '../level2/level2-tracked-fields';
import {UnsupportedTriggerClient} from './errors/UnsupportedTriggerClient';
import {logger} from '../../utils/logger';


export const deleteTriggerName = 'tbl_level2_before_delete';

// Where the acting principal is left for the trigger to pick up.
export const actorSetting = 'level2.actor'; // pg
export const actorVariable = '@level2_actor'; // mysql
export const actorTableName = 'tbl_level2_session'; // sqlite

const auditColumns = ['action', 'user', 'timestamp', 'row_id', 'field_name', 'field_value'];


function assertSupported(client: string): void {
  if (client !== 'pg' && client !== 'mysql' && client !== 'mysql2' && !isSqliteClient(client)) {
    throw new UnsupportedTriggerClient(`A delete trigger can not be created for the '${client}' client.`);
  }
}


// Falls back to the database's own user when nobody has set the actor, e.g. a delete run by hand.
function actorExpression(client: string): string {
  if (client === 'pg') {
    // NULLIF because once a transaction-local setting has been used the session reads it back as ''.
    return `COALESCE(NULLIF(current_setting(${quoteLiteral(actorSetting)}, true), ''), CURRENT_USER)`;
  }
  if (isSqliteClient(client)) {
    return `COALESCE((SELECT ${quoteIdentifier('actor', client)} FROM ${quoteIdentifier(actorTableName, client)} LIMIT 1), ${quoteLiteral('database')})`;
  }
  return `COALESCE(${actorVariable}, CURRENT_USER())`;
}


function timestampExpression(client: string): string {
  if (isSqliteClient(client)) {
    return `strftime(${quoteLiteral('%Y-%m-%dT%H:%M:%fZ')}, ${quoteLiteral('now')})`;
  }
  return 'CURRENT_TIMESTAMP';
}


// The database equivalent of recordDeletion. It reads OLD, i.e. the row as it was before the delete.
export function renderFieldBlock(field: TrackedField, client: string): string {

  assertSupported(client);
  const q = (identifier: string): string => quoteIdentifier(identifier, client);
  const columns = auditColumns.map(q).join(', ');
  const values = [
    quoteLiteral('delete'),
    actorExpression(client),
    timestampExpression(client),
    `OLD.${q('id')}`,
    quoteLiteral(field.column),
    `OLD.${q(field.column)}`
  ].join(', ');

  // sqlite triggers have no IF, a filtered INSERT ... SELECT does the same job.
  if (isSqliteClient(client)) {
    return `  INSERT INTO ${q(tables.level2Audit)} (${columns}) SELECT ${values} WHERE OLD.${q(field.column)} IS NOT NULL;`;
  }

  return [
    `  IF OLD.${q(field.column)} IS NOT NULL THEN`,
    `    INSERT INTO ${q(tables.level2Audit)} (${columns}) VALUES (${values});`,
    '  END IF;'
  ].join('\n');

}


export function buildDeleteTriggerSql(client: string): string[] {

  assertSupported(client);
  const q = (identifier: string): string => quoteIdentifier(identifier, client);
  const blocks = trackedFields.map((field): string => renderFieldBlock(field, client)).join('\n');

  if (client === 'pg') {
    return [
      `CREATE OR REPLACE FUNCTION ${q(deleteTriggerName)}() RETURNS trigger AS $$\nBEGIN\n${blocks}\n  RETURN OLD;\nEND;\n$$ LANGUAGE plpgsql`,
      `DROP TRIGGER IF EXISTS ${q(deleteTriggerName)} ON ${q(tables.level2)}`,
      `CREATE TRIGGER ${q(deleteTriggerName)} BEFORE DELETE ON ${q(tables.level2)} FOR EACH ROW EXECUTE FUNCTION ${q(deleteTriggerName)}()`
    ];
  }

  if (isSqliteClient(client)) {
    return [
      `CREATE TABLE IF NOT EXISTS ${q(actorTableName)} (${q('actor')} varchar(255) NOT NULL)`,
      `DROP TRIGGER IF EXISTS ${q(deleteTriggerName)}`,
      `CREATE TRIGGER ${q(deleteTriggerName)} BEFORE DELETE ON ${q(tables.level2)} FOR EACH ROW\nBEGIN\n${blocks}\nEND`
    ];
  }

  return [
    `DROP TRIGGER IF EXISTS ${q(deleteTriggerName)}`,
    `CREATE TRIGGER ${q(deleteTriggerName)} BEFORE DELETE ON ${q(tables.level2)} FOR EACH ROW\nBEGIN\n${blocks}\nEND`
  ];

}


export function buildRemoveTriggerSql(client: string): string[] {

  assertSupported(client);
  const q = (identifier: string): string => quoteIdentifier(identifier, client);

  if (client === 'pg') {
    return [
      `DROP TRIGGER IF EXISTS ${q(deleteTriggerName)} ON ${q(tables.level2)}`,
      `DROP FUNCTION IF EXISTS ${q(deleteTriggerName)}()`
    ];
  }

  return [`DROP TRIGGER IF EXISTS ${q(deleteTriggerName)}`];

}


export interface ActorSql {
  set: string;
  clear?: string; // pg needs none, its setting ends with the transaction
}

export function buildActorSql(client: string): ActorSql {

  assertSupported(client);
  const q = (identifier: string): string => quoteIdentifier(identifier, client);

  if (client === 'pg') {
    return {set: `SELECT set_config(${quoteLiteral(actorSetting)}, ?, true)`};
  }

  if (isSqliteClient(client)) {
    return {
      set: `INSERT INTO ${q(actorTableName)} (${q('actor')}) VALUES (?)`,
      clear: `DELETE FROM ${q(actorTableName)}`
    };
  }

  return {
    set: `SET ${actorVariable} = ?`,
    clear: `SET ${actorVariable} = NULL`
  };

}


//-------------------------------------------------
// Trigger actor
//-------------------------------------------------
// Must be called inside the transaction that does the delete.
export async function setTriggerActor(trx: Knex.Transaction, actor: string): Promise<void> {
  const actorSql = buildActorSql(clientName(trx));
  await trx.raw(actorSql.set, [actor]);
  return;
}


export async function clearTriggerActor(trx: Knex.Transaction): Promise<void> {
  const actorSql = buildActorSql(clientName(trx));
  if (actorSql.clear) {
    await trx.raw(actorSql.clear);
  }
  return;
}


//-------------------------------------------------
// Install / remove
//-------------------------------------------------
export async function installDeleteTrigger(db: Knex = knex): Promise<void> {

  const statements = buildDeleteTriggerSql(clientName(db));

  for (const statement of statements) {
    await db.raw(statement);
  }

  logger.info(`Installed the ${deleteTriggerName} trigger (${trackedFields.length} tracked fields).`);
  return;

}


// When the service does the auditing itself a leftover trigger would write every entry a second time.
export async function removeDeleteTrigger(db: Knex = knex): Promise<void> {

  const statements = buildRemoveTriggerSql(clientName(db));

  for (const statement of statements) {
    await db.raw(statement);
  }

  logger.debug(`Made sure the ${deleteTriggerName} trigger is not installed.`);
  return;

}
