import {Level2App} from '../level2/level2-app.class';
import {trackedFields} from '../level2/level2-tracked-fields';
import {AuditEntryApp} from './audit-entry-app.class';


export interface DeletionContext {
  actor: string;
  timestamp: Date;
}


//-------------------------------------------------
// Record Deletion
//-------------------------------------------------
// Given the row as it was just before it was removed, works out the audit entries to write: one per tracked field that held a value, in trackedFields order.
// Nothing is written here, the caller is responsible for saving the entries in the same transaction as the delete.
export function recordDeletion(row: Level2App & {id: number}, context: DeletionContext): AuditEntryApp[] {

  const entries: AuditEntryApp[] = [];

  trackedFields.forEach((field): void => {
    const value = row[field.property];
    // N.B. a value of 0 is still a value and therefore still audited.
    if (value === null || value === undefined) {
      return;
    }
    entries.push({
      action: 'delete',
      user: context.actor,
      timestamp: context.timestamp,
      rowId: row.id,
      fieldName: field.column,
      fieldValue: value
    });
  });

  return entries;

}
