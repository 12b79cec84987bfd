// packages/core/src/sources/elastic-index.ts — SearchIndex over Elasticsearch 8

import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Client } from '@elastic/elasticsearch';
import type { estypes } from '@elastic/elasticsearch';
import type { ElasticsearchConfig } from '../types/config.js';
import type { PublicationDocument } from '../types/publication.js';
import type { SearchHits, SearchRequest } from '../types/search.js';
import type { BulkItemOutcome, SearchIndex } from './search-index.js';

/** From sources: `src/sources/` → `mappings/`. The bundled CLI ships the file beside its entry. */
function resolveMappingPath(): string {
  const candidates = ['../../mappings/publications.json', './publications.json'].map((p) =>
    fileURLToPath(new URL(p, import.meta.url)),
  );
  return candidates.find((p) => existsSync(p)) ?? candidates[0];
}

export const PUBLICATIONS_MAPPING_PATH = resolveMappingPath();

interface IndexDefinition {
  settings?: estypes.IndicesIndexSettings;
  mappings?: estypes.MappingTypeMapping;
}

function loadIndexDefinition(path: string): IndexDefinition {
  const definition: IndexDefinition = JSON.parse(readFileSync(path, 'utf-8'));
  return definition;
}

/** ES 7 answers `total` as a number, ES 8 as `{ value }`. */
export function totalHits(total: number | estypes.SearchTotalHits | undefined): number {
  if (total === undefined) return 0;
  return typeof total === 'number' ? total : total.value;
}

export class ElasticSearchIndex implements SearchIndex {
  constructor(
    private readonly client: Client,
    private readonly index: string,
    private readonly mappingPath: string = PUBLICATIONS_MAPPING_PATH,
  ) {}

  /** API key takes precedence over username and password. */
  static fromConfig(config: ElasticsearchConfig): ElasticSearchIndex {
    const auth = config.apiKey
      ? { apiKey: config.apiKey }
      : config.username !== undefined && config.password !== undefined
        ? { username: config.username, password: config.password }
        : undefined;
    const client = new Client({
      node: config.node,
      requestTimeout: config.requestTimeoutMs,
      maxRetries: config.maxRetries,
      ...(auth ? { auth } : {}),
    });
    return new ElasticSearchIndex(client, config.index);
  }

  async ping(): Promise<boolean> {
    return this.client.ping();
  }

  async upsert(id: number, doc: PublicationDocument): Promise<void> {
    await this.client.index({ index: this.index, id: String(id), document: doc });
  }

  async bulkUpsert(docs: PublicationDocument[]): Promise<BulkItemOutcome[]> {
    if (docs.length === 0) return [];
    const response = await this.client.bulk({
      operations: docs.flatMap((doc) => [{ index: { _index: this.index, _id: String(doc.id) } }, doc]),
    });
    return docs.map((doc, i) => {
      const item = response.items[i]?.index;
      if (!item) return { id: doc.id, ok: false, error: 'missing bulk response item' };
      if (item.error) {
        return { id: doc.id, ok: false, error: item.error.reason ?? item.error.type };
      }
      return { id: doc.id, ok: true };
    });
  }

  async search(request: SearchRequest): Promise<SearchHits> {
    const response = await this.client.search<PublicationDocument>({
      index: this.index,
      query: request.query,
      from: request.from,
      size: request.size,
      sort: request.sort,
      track_total_hits: true,
    });
    const hits: PublicationDocument[] = [];
    for (const hit of response.hits.hits) {
      if (hit._source) hits.push(hit._source);
    }
    return { hits, total: totalHits(response.hits.total) };
  }

  async ensureIndex(): Promise<boolean> {
    if (await this.client.indices.exists({ index: this.index })) return false;
    const definition = loadIndexDefinition(this.mappingPath);
    await this.client.indices.create({ index: this.index, ...definition });
    return true;
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
