import {Knex} from 'knex';
import {isUndefined, omitBy} from 'lodash';
import {knex, clientName} from '../../db/knex';
import {tables} from '../../db/tables';
import {formatTimestamp, isUniqueViolation} from '../../db/db-helpers';
import {errorMessage} from '../../utils/error-message';
import {Level2App} from './level2-app.class';
import {Level2Db} from './level2-db.class';
import {trackedFields} from './level2-tracked-fields';
import {Level2RowNotFound} from './errors/Level2RowNotFound';
import {Level2RowAlreadyExists} from './errors/Level2RowAlreadyExists';
import {CreateLevel2RowFail} from './errors/CreateLevel2RowFail';
import {GetLevel2RowFail} from './errors/GetLevel2RowFail';
import {DeleteLevel2RowFail} from './errors/DeleteLevel2RowFail';
import {recordDeletion, DeletionContext} from '../level2-audit/deletion-recorder';
import {getAuditEntries, getLatestAuditEntryId, insertAuditEntries} from '../level2-audit/level2-audit.service';
import {clearTriggerActor, setTriggerActor} from '../level2-audit/delete-trigger';
import {AuditEntryApp} from '../level2-audit/audit-entry-app.class';


export interface AuditedDeletion {
  deleted: Level2App;
  auditEntries: AuditEntryApp[];
}


export async function createLevel2Table(): Promise<void> {

  await knex.schema.createTable(tables.level2, (table): void => {
    table.increments('id');
    table.string('station_id').notNullable();
    table.timestamp('date_time', {useTz: true}).notNullable();
    trackedFields.forEach((field): void => {
      table.double(field.column); // nullable, not every station measures everything
    });
    table.unique(['station_id', 'date_time']);
  });

  return;
}


//-------------------------------------------------
// Save Level 2 Row
//-------------------------------------------------
export async function saveLevel2Row(level2: Level2App): Promise<Level2App> {

  const level2Db = level2AppToDb(level2);

  try {
    await knex<Level2Db>(tables.level2)
    .insert(level2Db);
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw new Level2RowAlreadyExists(`A level 2 row for station '${level2.stationId}' at ${level2.dateTime ? level2.dateTime.toISOString() : 'an unknown time'} already exists.`);
    } else {
      throw new CreateLevel2RowFail(undefined, errorMessage(err));
    }
  }

  // Read it back rather than relying on RETURNING, which mysql lacks.
  let createdRow: Level2Db | undefined;
  try {
    createdRow = await knex<Level2Db>(tables.level2)
    .where({
      station_id: level2Db.station_id,
      date_time: level2Db.date_time
    })
    .first();
  } catch (err) {
    throw new GetLevel2RowFail(undefined, errorMessage(err));
  }

  if (!createdRow) {
    throw new CreateLevel2RowFail(undefined, 'Row could not be read back after insert');
  }

  return level2DbToApp(createdRow);

}


//-------------------------------------------------
// Get Level 2 Row
//-------------------------------------------------
export async function getLevel2Row(id: number): Promise<Level2App> {
  const level2Db = await selectLevel2Row(knex, id);
  return level2DbToApp(level2Db);
}


//-------------------------------------------------
// Delete Level 2 Row
//-------------------------------------------------
// The audit entries are written in the same transaction as the delete, so either the row goes and every entry is kept, or neither happens.
export async function deleteLevel2RowWithAudit(id: number, context: DeletionContext): Promise<AuditedDeletion> {

  return knex.transaction(async (trx): Promise<AuditedDeletion> => {

    const deleted = level2DbToApp(await selectLevel2Row(trx, id));
    const auditEntries = recordDeletion(Object.assign({}, deleted, {id}), context);

    // Audit first, as the BEFORE DELETE trigger would.
    await insertAuditEntries(auditEntries, trx);
    await removeLevel2Row(trx, id);

    return {deleted, auditEntries};

  });

}


// For when the database's own delete trigger is writing the audit rows. The actor is handed to the trigger through the transaction, and only the entries this delete produced are read back.
export async function deleteLevel2RowOnly(id: number, actor: string): Promise<AuditedDeletion> {

  return knex.transaction(async (trx): Promise<AuditedDeletion> => {

    const deleted = level2DbToApp(await selectLevel2Row(trx, id));
    const latestAuditEntryId = await getLatestAuditEntryId(trx);

    await setTriggerActor(trx, actor);
    try {
      await removeLevel2Row(trx, id);
    } finally {
      await clearTriggerActor(trx);
    }

    const auditEntries = await getAuditEntries({rowId: id, id: {gt: latestAuditEntryId}}, trx);
    return {deleted, auditEntries};

  });

}


async function selectLevel2Row(db: Knex, id: number): Promise<Level2Db> {

  let level2Db: Level2Db | undefined;
  try {
    level2Db = await db<Level2Db>(tables.level2)
    .where({id})
    .first();
  } catch (err) {
    throw new GetLevel2RowFail(undefined, errorMessage(err));
  }

  if (!level2Db) {
    throw new Level2RowNotFound(`A level 2 row with id '${id}' could not be found`);
  }

  return level2Db;

}


async function removeLevel2Row(trx: Knex.Transaction, id: number): Promise<void> {

  let nDeleted: number;
  try {
    nDeleted = await trx<Level2Db>(tables.level2)
    .where({id})
    .del();
  } catch (err) {
    throw new DeleteLevel2RowFail(undefined, errorMessage(err));
  }

  // Someone else got there first, throwing rolls back any audit entries we've written.
  if (nDeleted === 0) {
    throw new Level2RowNotFound(`A level 2 row with id '${id}' could not be found`);
  }

  return;

}


export function level2AppToDb(level2App: Level2App, client = clientName(knex)): Level2Db {

  const level2Db: Level2Db = {
    id: level2App.id,
    station_id: level2App.stationId,
    date_time: level2App.dateTime ? formatTimestamp(level2App.dateTime, client) : undefined
  };

  trackedFields.forEach((field): void => {
    level2Db[field.column] = level2App[field.property];
  });

  // Leaving undefined columns out lets the database apply its defaults (e.g. the auto-incrementing id).
  return omitBy(level2Db, isUndefined);

}


export function level2DbToApp(level2Db: Level2Db): Level2App {

  const level2App: Level2App = {
    id: level2Db.id,
    stationId: level2Db.station_id,
    dateTime: level2Db.date_time !== undefined ? new Date(level2Db.date_time) : undefined
  };

  trackedFields.forEach((field): void => {
    level2App[field.property] = level2Db[field.column];
  });

  return level2App;

}
