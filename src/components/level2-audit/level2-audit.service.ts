import {Knex} from 'knex';
import * as check from 'check-types';
import {knex, clientName} from '../../db/knex';
import {tables} from '../../db/tables';
import {formatTimestamp} from '../../db/db-helpers';
import {errorMessage} from '../../utils/error-message';
import {AuditEntryApp} from './audit-entry-app.class';
import {AuditEntryDb} from './audit-entry-db.class';
import {AuditEntriesWhere} from './audit-entries-where.class';
import {AuditWriteFail} from './errors/AuditWriteFail';
import {GetAuditEntriesFail} from './errors/GetAuditEntriesFail';


export async function createAuditTable(): Promise<void> {

  await knex.schema.createTable(tables.level2Audit, (table): void => {
    table.increments('id');
    table.string('action', 16).notNullable();
    table.string('user').notNullable();
    table.timestamp('timestamp', {useTz: true}).notNullable();
    table.integer('row_id').notNullable(); // no foreign key, the row it refers to has been deleted
    table.string('field_name').notNullable();
    table.double('field_value').notNullable();
    table.index('row_id');
  });

  return;
}


//-------------------------------------------------
// Insert Audit Entries
//-------------------------------------------------
// Must be given the transaction the deletion is running in, so that a failure here also undoes the deletion.
export async function insertAuditEntries(entries: AuditEntryApp[], trx: Knex.Transaction): Promise<number> {

  if (!check.nonEmptyArray(entries)) {
    return 0;
  }

  const client = clientName(trx);
  const rows = entries.map((entry): AuditEntryDb => auditEntryAppToDb(entry, client));

  try {
    await trx<AuditEntryDb>(tables.level2Audit)
    .insert(rows);
  } catch (err) {
    throw new AuditWriteFail(undefined, errorMessage(err));
  }

  return rows.length;

}


//-------------------------------------------------
// Get Audit Entries
//-------------------------------------------------
// Pass a transaction as db to see entries it has written but not yet committed.
export async function getAuditEntries(where: AuditEntriesWhere = {}, db: Knex = knex): Promise<AuditEntryApp[]> {

  let auditEntries: AuditEntryDb[];
  try {
    auditEntries = await db<AuditEntryDb>(tables.level2Audit)
    .select()
    .where((builder): void => {
      if (where.rowId !== undefined) {
        builder.where('row_id', where.rowId);
      }
      if (where.fieldName !== undefined) {
        builder.where('field_name', where.fieldName);
      }
      if (where.id !== undefined && where.id.gt !== undefined) {
        builder.where('id', '>', where.id.gt);
      }
    })
    .orderBy('id', 'asc');
  } catch (err) {
    throw new GetAuditEntriesFail(undefined, errorMessage(err));
  }

  return auditEntries.map(auditEntryDbToApp);

}


// 0 when the store is empty. Anything written after this call will have a larger id.
export async function getLatestAuditEntryId(db: Knex = knex): Promise<number> {

  let latest: Pick<AuditEntryDb, 'id'> | undefined;
  try {
    latest = await db<AuditEntryDb>(tables.level2Audit)
    .select('id')
    .orderBy('id', 'desc')
    .first();
  } catch (err) {
    throw new GetAuditEntriesFail(undefined, errorMessage(err));
  }

  return latest && latest.id !== undefined ? latest.id : 0;

}


export function auditEntryAppToDb(auditEntryApp: AuditEntryApp, client = clientName(knex)): AuditEntryDb {
  return {
    action: auditEntryApp.action,
    user: auditEntryApp.user,
    timestamp: auditEntryApp.timestamp ? formatTimestamp(auditEntryApp.timestamp, client) : undefined,
    row_id: auditEntryApp.rowId,
    field_name: auditEntryApp.fieldName,
    field_value: auditEntryApp.fieldValue
  };
}


export function auditEntryDbToApp(auditEntryDb: AuditEntryDb): AuditEntryApp {
  return {
    id: auditEntryDb.id,
    action: auditEntryDb.action,
    user: auditEntryDb.user,
    timestamp: auditEntryDb.timestamp !== undefined ? new Date(auditEntryDb.timestamp) : undefined,
    rowId: auditEntryDb.row_id,
    fieldName: auditEntryDb.field_name,
    fieldValue: auditEntryDb.field_value
  };
}
