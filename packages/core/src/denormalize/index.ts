// packages/core/src/denormalize/index.ts -- barrel re-export

export { parseAmount } from './amount.js';
export { sanitizeDate } from './dates.js';
export { splitIds, parseTags } from './aggregates.js';
export { SparseDocumentBuilder } from './document-builder.js';
export type { OptionalKeys, RequiredFields } from './document-builder.js';
export { Denormalizer, buildDocument } from './denormalizer.js';
