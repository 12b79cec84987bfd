// packages/core/src/sources/search-index.ts — Write and query side of the search engine

import type { PublicationDocument } from '../types/publication.js';
import type { SearchHits, SearchRequest } from '../types/search.js';

export interface BulkItemOutcome {
  id: number;
  ok: boolean;
  error?: string;
}

export interface SearchIndex {
  /** False (or a throw) means the engine is unreachable. */
  ping(): Promise<boolean>;
  upsert(id: number, doc: PublicationDocument): Promise<void>;
  /** One outcome per input document, in input order. */
  bulkUpsert(docs: PublicationDocument[]): Promise<BulkItemOutcome[]>;
  search(request: SearchRequest): Promise<SearchHits>;
  /** Create the index with the publication mapping when it is missing. Returns true when created. */
  ensureIndex(): Promise<boolean>;
  close(): Promise<void>;
}
