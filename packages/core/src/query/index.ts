// packages/core/src/query/index.ts -- barrel re-export

export { compileQuery, normalizeDateBound } from './compiler.js';
export { parseSearchParams, buildSearchRequest, pageCount, searchPublications } from './search.js';
