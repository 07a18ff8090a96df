import {knex} from '../../db/knex';
import {tables} from '../../db/tables';
import {auditEntryAppToDb, auditEntryDbToApp, createAuditTable, getAuditEntries, getLatestAuditEntryId, insertAuditEntries} from './level2-audit.service';
import {AuditEntryApp} from './audit-entry-app.class';
import {AuditWriteFail} from './errors/AuditWriteFail';


describe('Testing of audit entry converters', () => {

  test('Converts an app entry to a row', () => {
    const auditEntryApp: AuditEntryApp = {
      action: 'delete',
      user: 'svc_ingest',
      timestamp: new Date('2017-08-03T12:30:00.000Z'),
      rowId: 42,
      fieldName: 'air_temp',
      fieldValue: 15.2
    };
    const expected = {
      action: 'delete',
      user: 'svc_ingest',
      timestamp: '2017-08-03T12:30:00.000Z',
      row_id: 42,
      field_name: 'air_temp',
      field_value: 15.2
    };
    expect(auditEntryAppToDb(auditEntryApp)).toEqual(expected);
  });

  test('Keeps the timestamp as a date for server databases', () => {
    const timestamp = new Date('2017-08-03T12:30:00.000Z');
    const auditEntryDb = auditEntryAppToDb({action: 'delete', user: 'svc_ingest', timestamp, rowId: 42, fieldName: 'air_temp', fieldValue: 15.2}, 'mysql2');
    expect(auditEntryDb.timestamp).toBe(timestamp);
  });

  test('Converts a row to an app entry, whether the timestamp comes back as a string or a date', () => {
    const expected = {
      id: 5,
      action: 'delete',
      user: 'svc_ingest',
      timestamp: new Date('2017-08-03T12:30:00.000Z'),
      rowId: 42,
      fieldName: 'relative_humidity',
      fieldValue: 88
    };
    const base = {id: 5, action: 'delete' as const, user: 'svc_ingest', row_id: 42, field_name: 'relative_humidity', field_value: 88};
    expect(auditEntryDbToApp(Object.assign({}, base, {timestamp: '2017-08-03T12:30:00.000Z'}))).toEqual(expected);
    expect(auditEntryDbToApp(Object.assign({}, base, {timestamp: new Date('2017-08-03T12:30:00.000Z')}))).toEqual(expected);
  });

});


describe('Testing of the audit store', () => {

  const timestamp = new Date('2017-08-03T12:30:00.000Z');

  const entries: AuditEntryApp[] = [
    {action: 'delete', user: 'svc_ingest', timestamp, rowId: 42, fieldName: 'air_temp', fieldValue: 15.2},
    {action: 'delete', user: 'svc_ingest', timestamp, rowId: 42, fieldName: 'relative_humidity', fieldValue: 88},
    {action: 'delete', user: 'qc_user', timestamp, rowId: 43, fieldName: 'air_temp', fieldValue: -3.5}
  ];

  beforeEach(async () => {
    await knex.schema.dropTableIfExists(tables.level2Audit);
    await createAuditTable();
  });

  afterAll(async () => {
    await knex.destroy();
  });

  test('Inserts entries and reads them back in insertion order', async () => {

    const nInserted = await knex.transaction((trx) => insertAuditEntries(entries, trx));
    expect(nInserted).toBe(3);

    const all = await getAuditEntries();
    expect(all).toEqual([
      Object.assign({id: 1}, entries[0]),
      Object.assign({id: 2}, entries[1]),
      Object.assign({id: 3}, entries[2])
    ]);

  });

  test('Filters by row id and field name', async () => {

    await knex.transaction((trx) => insertAuditEntries(entries, trx));

    const forRow42 = await getAuditEntries({rowId: 42});
    expect(forRow42.map((entry) => entry.fieldName)).toEqual(['air_temp', 'relative_humidity']);

    const airTemps = await getAuditEntries({fieldName: 'air_temp'});
    expect(airTemps.map((entry) => entry.rowId)).toEqual([42, 43]);

    const both = await getAuditEntries({rowId: 43, fieldName: 'air_temp'});
    expect(both.length).toBe(1);
    expect(both[0].fieldValue).toBe(-3.5);

  });

  test('Only returns entries newer than a given id', async () => {
    await knex.transaction((trx) => insertAuditEntries(entries, trx));
    const newer = await getAuditEntries({rowId: 42, id: {gt: 1}});
    expect(newer).toEqual([Object.assign({id: 2}, entries[1])]);
  });

  test('Gets the id of the latest entry', async () => {
    expect(await getLatestAuditEntryId()).toBe(0);
    await knex.transaction((trx) => insertAuditEntries(entries, trx));
    expect(await getLatestAuditEntryId()).toBe(3);
  });

  test('Writes nothing for an empty list', async () => {
    const nInserted = await knex.transaction((trx) => insertAuditEntries([], trx));
    expect(nInserted).toBe(0);
    expect(await getAuditEntries()).toEqual([]);
  });

  test('Raises an AuditWriteFail when the store can not be written to', async () => {
    await knex.schema.dropTable(tables.level2Audit);
    await expect(knex.transaction((trx) => insertAuditEntries(entries, trx))).rejects.toThrow(AuditWriteFail);
  });

});
