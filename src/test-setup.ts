// Each jest worker gets its own in-memory database.
process.env.DB_CLIENT = 'better-sqlite3';
process.env.DB_FILENAME = ':memory:';
process.env.LOGGER_LEVEL = 'silent';
process.env.AUDIT_MODE = 'application';
