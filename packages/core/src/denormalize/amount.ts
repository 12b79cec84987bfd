// packages/core/src/denormalize/amount.ts — Localized monetary string parsing

const DECIMAL = /^[+-]?\d+(\.\d+)?$/;

/**
 * Parse an amount such as `$3.900.000,50` into `3900000.5`.
 *
 * `.` is the thousands separator and `,` the decimal separator; a leading
 * currency symbol and any whitespace are dropped. Missing, blank and zero
 * amounts are absent. An amount that still does not parse is absent and
 * reported through `onWarn`.
 */
export function parseAmount(
  value: string | number | null | undefined,
  onWarn?: (message: string) => void,
): number | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'number') {
    if (value === 0) return undefined;
    if (!Number.isFinite(value)) {
      onWarn?.(`Failed to parse monto '${value}'`);
      return undefined;
    }
    return value;
  }

  const raw = value.trim();
  if (raw === '' || raw === '0') return undefined;

  const cleaned = raw
    .replace(/^[^\d\s.,+-]+/, '')
    .replace(/\s+/g, '')
    .replace(/\./g, '')
    .replace(',', '.');

  const parsed = DECIMAL.test(cleaned) ? Number(cleaned) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    onWarn?.(`Failed to parse monto '${raw}' (cleaned: '${cleaned}')`);
    return undefined;
  }
  return parsed;
}
