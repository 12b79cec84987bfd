// packages/core/src/indexing/index.ts -- barrel re-export

export { ensureReachable } from './context.js';
export type { IndexingDeps } from './context.js';
export { indexPublication } from './single.js';
export { indexChangedSince } from './incremental.js';
export type { IncrementalOptions } from './incremental.js';
export { reindexAll } from './bulk.js';
export { createIndexingUnit } from './dispatch.js';
