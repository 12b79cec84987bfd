// packages/core/src/memory/index.ts -- barrel re-export

export { openDatabase, runMigrations, getSchemaVersion } from './database.js';
export { JobStore } from './job-store.js';
