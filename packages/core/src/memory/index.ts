// packages/core/src/memory/index.ts -- barrel re-export

export { openDatabase, runMigrations, getSchemaVersion } from './database.js';
export { SqliteRunRepository, InMemoryRunRepository } from './run-store.js';
export type { RunListFilter } from './run-store.js';
