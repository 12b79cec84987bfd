// packages/core/src/denormalize/aggregates.ts — Split comma-delimited join aggregates

import type { TagRef } from '../types/publication.js';

const DIGITS = /^\d+$/;

/**
 * Split `"3,7,x,3"` into `[3, 7]`. Non-numeric fragments are dropped and
 * duplicates keep their first position.
 */
export function splitIds(raw: string | null | undefined): number[] {
  if (!raw) return [];
  const seen = new Set<number>();
  for (const fragment of raw.split(',')) {
    const trimmed = fragment.trim();
    if (DIGITS.test(trimmed)) seen.add(Number(trimmed));
  }
  return [...seen];
}

/**
 * Parse `"12:Obras,15:Salud"` into tag refs. The description is everything
 * after the first colon; a fragment without a numeric id is dropped.
 */
export function parseTags(raw: string | null | undefined): TagRef[] {
  if (!raw) return [];
  const tags = new Map<number, TagRef>();
  for (const fragment of raw.split(',')) {
    const sep = fragment.indexOf(':');
    if (sep < 0) continue;
    const idPart = fragment.slice(0, sep).trim();
    if (!DIGITS.test(idPart)) continue;
    const id = Number(idPart);
    if (!tags.has(id)) {
      tags.set(id, { id, descripcion: fragment.slice(sep + 1) });
    }
  }
  return [...tags.values()];
}
