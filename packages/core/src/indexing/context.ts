// packages/core/src/indexing/context.ts — Collaborators shared by the indexing recipes

import type { Denormalizer } from '../denormalize/denormalizer.js';
import type { DataSource } from '../sources/data-source.js';
import type { SearchIndex } from '../sources/search-index.js';
import type { IndexingConfig } from '../types/config.js';
import { SourceUnavailableError, errorMessage } from '../utils/errors.js';

export interface IndexingDeps {
  source: DataSource;
  index: SearchIndex;
  denormalizer: Denormalizer;
  settings: IndexingConfig;
}

/** Fail fast when the search engine cannot be reached; nothing is processed. */
export async function ensureReachable(index: SearchIndex): Promise<void> {
  let reachable: boolean;
  try {
    reachable = await index.ping();
  } catch (err) {
    throw new SourceUnavailableError(`Search engine unreachable: ${errorMessage(err)}`, 'elasticsearch', err);
  }
  if (!reachable) {
    throw new SourceUnavailableError('Search engine unreachable: ping failed', 'elasticsearch');
  }
}

/** Run a candidate query, reporting failures as the relational store being unavailable. */
export async function readCandidates(what: string, query: () => Promise<number[]>): Promise<number[]> {
  try {
    return await query();
  } catch (err) {
    throw new SourceUnavailableError(`Failed to list ${what}: ${errorMessage(err)}`, 'mysql', err);
  }
}
