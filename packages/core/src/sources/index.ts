// packages/core/src/sources/index.ts -- barrel re-export

export type { DataSource, ChangedSinceOptions } from './data-source.js';
export type { SearchIndex, BulkItemOutcome } from './search-index.js';
export { MysqlDataSource } from './mysql-source.js';
export { ElasticSearchIndex, PUBLICATIONS_MAPPING_PATH, totalHits } from './elastic-index.js';
