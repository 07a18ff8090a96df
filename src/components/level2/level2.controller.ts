import * as joi from 'joi';
import {config} from '../../config';
import {logger} from '../../utils/logger';
import {logCensorAndRethrow} from '../../utils/handle-operation-error';
import * as level2Service from './level2.service';
import {AuditedDeletion} from './level2.service';
import {InvalidDeleteRequest} from './errors/InvalidDeleteRequest';


export interface DeleteLevel2RowRequest {
  id: number;
  actor: string;
}

const deleteLevel2RowRequestSchema = joi.object<DeleteLevel2RowRequest>({
  id: joi.number()
    .integer()
    .positive()
    .required(),
  // i.e. who is doing the deleting, this ends up in the user column of the audit entries.
  actor: joi.string()
    .trim()
    .required()
  // No timestamp: entries are always stamped with the time the request is handled.
}).required();


//-------------------------------------------------
// Delete Level 2 Row
//-------------------------------------------------
export async function deleteLevel2Row(request: unknown): Promise<AuditedDeletion> {

  const operationName = 'level2 row deletion';

  let deletion: AuditedDeletion;
  try {

    const result = deleteLevel2RowRequestSchema.validate(request);
    if (result.error) {
      throw new InvalidDeleteRequest(`Invalid delete request: ${result.error.message}`);
    }

    const {id, actor} = result.value;
    const timestamp = new Date();
    logger.debug({id, actor, timestamp, mode: config.audit.mode}, 'Deleting level 2 row');

    if (config.audit.mode === 'trigger') {
      // The trigger stamps the entries with the database's clock, so read back what it wrote.
      deletion = await level2Service.deleteLevel2RowOnly(id, actor);
    } else {
      deletion = await level2Service.deleteLevel2RowWithAudit(id, {actor, timestamp});
    }

  } catch (err) {
    logCensorAndRethrow(operationName, err);
  }

  logger.info({id: deletion.deleted.id, nAuditEntries: deletion.auditEntries.length}, 'Level 2 row deleted');
  return deletion;

}
