// packages/core/src/denormalize/denormalizer.ts — Publication row → flat search document

import type { DataSource } from '../sources/data-source.js';
import type { PublicationDocument, PublicationRow, TenderTypeIds } from '../types/publication.js';
import { SourceUnavailableError, errorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { splitIds, parseTags } from './aggregates.js';
import { parseAmount } from './amount.js';
import { sanitizeDate } from './dates.js';
import { SparseDocumentBuilder } from './document-builder.js';

function toBoolean(value: number | boolean | null | undefined): boolean | undefined {
  if (value === null || value === undefined) return undefined;
  return typeof value === 'boolean' ? value : value !== 0;
}

function toExchangeRate(value: string | number | null | undefined): number {
  const rate = Number(value || 0);
  return Number.isFinite(rate) ? rate : 0;
}

function tenderTypeIds(row: PublicationRow): TenderTypeIds | undefined {
  const ids = new SparseDocumentBuilder<TenderTypeIds>({})
    .set('esAR', row.tipo_licit_id_esAR)
    .set('ptBR', row.tipo_licit_id_ptBR)
    .set('enUS', row.tipo_licit_id_enUS);
  return ids.optionalCount > 0 ? ids.build() : undefined;
}

/**
 * Flatten one correlated row into the index document. Pure apart from the
 * warning callback used for amounts that fail to parse.
 */
export function buildDocument(
  row: PublicationRow,
  onWarn?: (message: string) => void,
): PublicationDocument {
  return new SparseDocumentBuilder<PublicationDocument>({
    id: row.id,
    tag_ids: splitIds(row.tag_ids_raw),
    tags: parseTags(row.tags_raw),
    mercado_ids: splitIds(row.mercado_ids_raw),
    tasaCambioUSD: toExchangeRate(row.tasaCambioUSD),
    vigente: Boolean(row.vigente),
  })
    .set('scraper', row.scraper)
    .set('idexterno', row.idexterno)
    .set('referencia', row.referencia)
    .set('objeto', row.objeto)
    .set('agencia', row.agencia)
    .set('oficina', row.oficina)
    .set('link', row.link)
    .set('publicado', sanitizeDate(row.publicado))
    .set('actualizado', sanitizeDate(row.actualizado))
    .set('apertura', sanitizeDate(row.apertura))
    .set('cierre', sanitizeDate(row.cierre))
    .set('pais', row.pais)
    .set('rubro', row.rubro)
    .set('subrubro', row.subrubro)
    .set('tipo', row.tipo)
    .set('tipo_id', row.tipo_id)
    .set('tipo_cliente_id', row.tipo_cliente_id == null ? undefined : String(row.tipo_cliente_id))
    .set('contacto', row.contacto)
    .set('observaciones', row.observaciones)
    .set('categoria', row.categoria)
    .set('cargado', sanitizeDate(row.cargado))
    .set('editado', sanitizeDate(row.editado))
    .set('visible', toBoolean(row.visible))
    .set('attachs', row.attachs)
    .set('monto', parseAmount(row.monto, onWarn))
    .set('divisaSimboloISO', row.divisaSimboloISO)
    .set('pais_nombre', row.pais_nombre)
    .set('pais_id', row.pais_id)
    .set('tipo_licit_ids', tenderTypeIds(row))
    .build();
}

export class Denormalizer {
  constructor(
    private readonly source: DataSource,
    private readonly logger: Logger = silentLogger,
  ) {}

  /**
   * Read publication `id` with its relations and flatten it.
   * Returns null when the publication does not exist.
   */
  async denormalize(id: number, logger: Logger = this.logger): Promise<PublicationDocument | null> {
    let row: PublicationRow | null;
    try {
      row = await this.source.fetchWithJoins(id);
    } catch (err) {
      throw new SourceUnavailableError(
        `Failed to read publication ${id}: ${errorMessage(err)}`,
        'mysql',
        err,
      );
    }
    if (!row) return null;
    return buildDocument(row, (message) => logger.warn(`Publication ${id}: ${message}`));
  }
}
