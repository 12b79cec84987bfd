// packages/cli/src/commands/search.ts — Run a publication search and print the response

import type { SearchParamsInput } from '@pubsync/core';

import { exitWithError, withService, type GlobalOptions } from '../utils.js';

export interface SearchOptions extends GlobalOptions {
  page?: number;
  pageSize?: number;
  objeto?: string;
  agencia?: string;
  pais?: string;
  rubro?: string;
  from?: string;
  to?: string;
  includeExpired?: boolean;
  onlyCurrent?: boolean;
  userTags?: number[];
  mine?: boolean;
}

/** Map CLI flags onto the search parameter names the front end sends. */
export function buildSearchInput(text: string | undefined, options: SearchOptions): SearchParamsInput {
  return {
    page: options.page,
    page_size: options.pageSize,
    search: text,
    objeto: options.objeto,
    agencia: options.agencia,
    pais: options.pais,
    rubro: options.rubro,
    apertura_fr: options.from,
    apertura_to: options.to,
    incluirVencidos: options.includeExpired ? '1' : '0',
    soloVigentes: options.onlyCurrent ? '1' : undefined,
    user_tag_ids: options.userTags,
    filter_mode: options.mine ? 'user_tags' : 'all',
  };
}

export async function searchCommand(text: string | undefined, options: SearchOptions): Promise<void> {
  try {
    const response = await withService(options, (service) => service.search(buildSearchInput(text, options)));
    console.log(JSON.stringify(response, null, 2));
  } catch (error) {
    exitWithError(error);
  }
}
