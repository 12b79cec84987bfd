import { compileQuery, parseSearchParams } from '@pubsync/core';
import { describe, expect, it } from 'vitest';

import { buildJobParams, buildListFilters } from '../src/commands/jobs.js';
import { buildSearchInput } from '../src/commands/search.js';

describe('jobs commands', () => {
  it('maps start flags onto job parameters', () => {
    expect(buildJobParams('index-scraper', { scraperId: 9, since: '2024-03-01' })).toEqual({
      type: 'index-scraper',
      publicationId: undefined,
      scraperId: 9,
      since: '2024-03-01',
    });
  });

  it('builds list filters with defaults', () => {
    expect(buildListFilters({ status: 'failed', owner: 'owner_1' })).toEqual({
      status: 'failed',
      type: undefined,
      ownerId: 'owner_1',
      limit: 20,
      offset: 0,
    });
  });

  it('rejects unknown statuses and types', () => {
    expect(() => buildListFilters({ status: 'queued' })).toThrow('Unknown status: queued');
    expect(() => buildListFilters({ type: 'review' })).toThrow('Unknown job type: review');
  });
});

describe('search command', () => {
  it('maps flags onto search parameters', () => {
    expect(
      buildSearchInput('puente', { pais: 'Chile', onlyCurrent: true, userTags: [3, 5], mine: true, page: 2 }),
    ).toEqual({
      page: 2,
      search: 'puente',
      pais: 'Chile',
      incluirVencidos: '0',
      soloVigentes: '1',
      user_tag_ids: [3, 5],
      filter_mode: 'user_tags',
    });
  });

  it('defaults to the unrestricted filter mode', () => {
    expect(buildSearchInput(undefined, {})).toEqual({ incluirVencidos: '0', filter_mode: 'all' });
  });

  it('hides expired publications unless --include-expired is set', () => {
    const filterOf = (options: { includeExpired?: boolean }) =>
      compileQuery(parseSearchParams(buildSearchInput(undefined, options))).bool.filter;

    expect(filterOf({})).toEqual([{ term: { vigente: true } }, { term: { visible: true } }]);
    expect(filterOf({ includeExpired: true })).toEqual([{ term: { visible: true } }]);
  });
});
