import {knex} from './knex';
import {tables} from './tables';
import {config} from '../config';
import {logger} from '../utils/logger';
import {createLevel2Table} from '../components/level2/level2.service';
import {createAuditTable} from '../components/level2-audit/level2-audit.service';
import {installDeleteTrigger, removeDeleteTrigger} from '../components/level2-audit/delete-trigger';


export async function initialiseDb(): Promise<void> {

  // The audit table goes first so the trigger always has somewhere to write to.
  const level2AuditExists = await knex.schema.hasTable(tables.level2Audit);
  if (!level2AuditExists) {
    await createAuditTable();
    logger.info(`Created the ${tables.level2Audit} table`);
  }

  const level2Exists = await knex.schema.hasTable(tables.level2);
  if (!level2Exists) {
    await createLevel2Table();
    logger.info(`Created the ${tables.level2} table`);
  }

  // Only one of the trigger and the service may write the audit entries, so switching modes has to undo the other one.
  if (config.audit.mode === 'trigger') {
    await installDeleteTrigger(knex);
  } else {
    await removeDeleteTrigger(knex);
  }

  return;

}
