// packages/core/src/denormalize/dates.ts

const ZERO_DATE_PREFIX = '0000-00-00';

/** Drop missing and zero dates; everything else passes through as the source wrote it. */
export function sanitizeDate(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  const trimmed = value.trim();
  if (trimmed === '' || trimmed === 'None' || trimmed.startsWith(ZERO_DATE_PREFIX)) {
    return undefined;
  }
  return value;
}
