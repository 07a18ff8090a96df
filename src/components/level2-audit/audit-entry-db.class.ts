import {AuditAction} from './audit-entry-app.class';

export class AuditEntryDb {
  public id?: number;
  public action?: AuditAction;
  public user?: string;
  public timestamp?: string | Date;
  public row_id?: number;
  public field_name?: string;
  public field_value?: number;
}
