export class AuditEntriesWhere {
  public id?: {gt?: number};
  public rowId?: number;
  public fieldName?: string;
}
