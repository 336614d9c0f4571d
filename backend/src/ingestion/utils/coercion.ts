/** Placeholders exporters write for "no value" (compared case-insensitively) */
const MISSING_MARKERS = new Set(['', '-', 'n/a', 'na', 'nan', 'null']);

const DECIMAL_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Parse an energy reading.
 *
 * Only plain decimal literals are accepted ("12", "-0.5", "1.2e3"); units,
 * thousands separators, hex and anything that overflows to Infinity yield
 * null. Negative readings are kept as they are.
 */
export function coerceNumber(raw: string | undefined): number | null {
  const trimmed = raw?.trim() ?? '';
  if (MISSING_MARKERS.has(trimmed.toLowerCase())) {
    return null;
  }
  if (!DECIMAL_LITERAL.test(trimmed)) {
    return null;
  }

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Device identifier with surrounding whitespace removed, otherwise verbatim.
 * Empty result means the row has no usable serial.
 */
export function coerceSerial(raw: string | undefined): string | null {
  const serial = (raw ?? '').trim();
  return serial === '' ? null : serial;
}
