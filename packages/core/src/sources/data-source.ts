// packages/core/src/sources/data-source.ts — Read side of the relational store

import type { PublicationRow } from '../types/publication.js';

export interface ChangedSinceOptions {
  scraperId?: number;
  limit: number;
}

/**
 * Relational store the denormalizer and the candidate queries read from.
 * Candidate queries only return visible publications.
 */
export interface DataSource {
  /** Parent row correlated with its relations, or null when the id does not exist. */
  fetchWithJoins(id: number): Promise<PublicationRow | null>;
  /** Ids loaded or edited at or after `since`, newest edit first. */
  listChangedSince(since: string, options: ChangedSinceOptions): Promise<number[]>;
  /** One page of ids in ascending order. */
  listAllIds(pageSize: number, offset: number): Promise<number[]>;
  close(): Promise<void>;
}
