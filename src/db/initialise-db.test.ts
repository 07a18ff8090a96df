import {knex} from './knex';
import {tables} from './tables';
import {initialiseDb} from './initialise-db';
import {config} from '../config';
import {deleteTriggerName} from '../components/level2-audit/delete-trigger';
import {saveLevel2Row} from '../components/level2/level2.service';
import {getAuditEntries} from '../components/level2-audit/level2-audit.service';
import {deleteLevel2Row} from '../components/level2/level2.controller';


async function installedTriggers(): Promise<string[]> {
  const rows: {name: string}[] = await knex('sqlite_master')
  .select('name')
  .where({type: 'trigger'});
  return rows.map((row) => row.name);
}


describe('Testing of initialiseDb function', () => {

  beforeEach(async () => {
    await knex.schema.dropTableIfExists(tables.level2Audit);
    await knex.schema.dropTableIfExists(tables.level2);
  });

  afterEach(() => {
    config.audit.mode = 'application';
  });

  afterAll(async () => {
    await knex.destroy();
  });

  test('Creates both tables', async () => {
    await initialiseDb();
    expect(await knex.schema.hasTable(tables.level2)).toBe(true);
    expect(await knex.schema.hasTable(tables.level2Audit)).toBe(true);
  });

  test('Can be run against a database that is already set up', async () => {
    await initialiseDb();
    await expect(initialiseDb()).resolves.toBeUndefined();
  });

  test('Installs the delete trigger in trigger mode only', async () => {
    config.audit.mode = 'trigger';
    await initialiseDb();
    expect(await installedTriggers()).toEqual([deleteTriggerName]);
    config.audit.mode = 'application';
    await initialiseDb();
    expect(await installedTriggers()).toEqual([]);
  });

  test('Audits each field once after switching from trigger mode back to application mode', async () => {

    config.audit.mode = 'trigger';
    await initialiseDb();
    config.audit.mode = 'application';
    await initialiseDb();

    const saved = await saveLevel2Row({stationId: 'BOGUS1', dateTime: new Date('2017-08-03T12:00:00.000Z'), airTemp: 15.2});
    const deletion = await deleteLevel2Row({id: saved.id, actor: 'svc_ingest'});

    expect(deletion.auditEntries.length).toBe(1);
    const persisted = await getAuditEntries({rowId: saved.id});
    expect(persisted.map((entry) => [entry.user, entry.fieldName, entry.fieldValue])).toEqual([['svc_ingest', 'air_temp', 15.2]]);

  });

});
