// Error codes each of our supported clients uses when a unique constraint is violated.
const uniqueViolationCodes = [
  '23505', // pg
  'ER_DUP_ENTRY', // mysql2
  'SQLITE_CONSTRAINT_UNIQUE', // better-sqlite3
  'SQLITE_CONSTRAINT_PRIMARYKEY'
];


export function isUniqueViolation(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err)) {
    return false;
  }
  return typeof err.code === 'string' && uniqueViolationCodes.includes(err.code);
}


// Used when writing raw SQL, e.g. for the trigger definitions.
export function quoteIdentifier(identifier: string, client: string): string {
  if (client === 'mysql' || client === 'mysql2') {
    return `\`${identifier.replace(/`/g, '``')}\``;
  }
  return `"${identifier.replace(/"/g, '""')}"`;
}


export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, '\'\'')}'`;
}


export function isSqliteClient(client: string): boolean {
  return client === 'better-sqlite3' || client === 'sqlite3';
}


// pg and mysql2 serialise Date bindings themselves (mysql rejects the trailing 'Z' of an ISO string), whereas sqlite has no date type and gets the ISO string.
export function formatTimestamp(date: Date, client: string): Date | string {
  return isSqliteClient(client) ? date.toISOString() : date;
}
