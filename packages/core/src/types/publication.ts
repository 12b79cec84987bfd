// packages/core/src/types/publication.ts — Source rows and the denormalized search document

/**
 * One row of the correlated publication read. Aggregated relations arrive as
 * comma-delimited strings (`tag_ids_raw`, `tags_raw`, `mercado_ids_raw`).
 * Dates are the source's `YYYY-MM-DD HH:MM:SS` strings, possibly zero dates.
 */
export interface PublicationRow {
  id: number;
  scraper?: number | null;
  idexterno?: string | null;
  referencia?: string | null;
  objeto?: string | null;
  agencia?: string | null;
  oficina?: string | null;
  link?: string | null;
  publicado?: string | null;
  actualizado?: string | null;
  apertura?: string | null;
  cierre?: string | null;
  pais?: string | null;
  rubro?: string | null;
  subrubro?: string | null;
  tipo?: string | null;
  tipo_id?: number | null;
  tipo_cliente_id?: string | number | null;
  contacto?: string | null;
  observaciones?: string | null;
  categoria?: number | null;
  cargado?: string | null;
  editado?: string | null;
  visible?: number | boolean | null;
  attachs?: string | null;
  monto?: string | number | null;
  divisaSimboloISO?: string | null;
  tag_ids_raw?: string | null;
  tags_raw?: string | null;
  pais_nombre?: string | null;
  pais_id?: number | null;
  mercado_ids_raw?: string | null;
  tipo_licit_id_esAR?: number | null;
  tipo_licit_id_ptBR?: number | null;
  tipo_licit_id_enUS?: number | null;
  tasaCambioUSD?: string | number | null;
  vigente?: number | boolean | null;
}

export interface TagRef {
  id: number;
  descripcion: string;
}

export interface TenderTypeIds {
  esAR?: number;
  ptBR?: number;
  enUS?: number;
}

/**
 * The document written to the search index. Optional keys are omitted when the
 * source has no value; they are never null.
 */
export interface PublicationDocument {
  id: number;
  scraper?: number;
  idexterno?: string;
  referencia?: string;
  objeto?: string;
  agencia?: string;
  oficina?: string;
  link?: string;
  publicado?: string;
  actualizado?: string;
  apertura?: string;
  cierre?: string;
  pais?: string;
  rubro?: string;
  subrubro?: string;
  tipo?: string;
  tipo_id?: number;
  tipo_cliente_id?: string;
  contacto?: string;
  observaciones?: string;
  categoria?: number;
  cargado?: string;
  editado?: string;
  visible?: boolean;
  attachs?: string;
  monto?: number;
  divisaSimboloISO?: string;
  tag_ids: number[];
  tags: TagRef[];
  pais_nombre?: string;
  pais_id?: number;
  mercado_ids: number[];
  tipo_licit_ids?: TenderTypeIds;
  tasaCambioUSD: number;
  vigente: boolean;
}
