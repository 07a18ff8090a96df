export type AuditAction = 'delete';

export class AuditEntryApp {
  public id?: number;
  public action?: AuditAction;
  public user?: string;
  public timestamp?: Date;
  public rowId?: number;
  public fieldName?: string;
  public fieldValue?: number;
}
