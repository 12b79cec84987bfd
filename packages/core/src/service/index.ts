// packages/core/src/service/index.ts -- barrel re-export

export { IndexingService } from './indexing-service.js';
export type { IndexingServiceDeps } from './indexing-service.js';
