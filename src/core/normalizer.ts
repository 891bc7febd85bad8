const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export function parseDecimal(raw: string | null | undefined): number | null {
  if (typeof raw !== "string") {
    return null;
  }

  const trimmed = raw.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Maps a raw counter value onto `log10(value + 1)`. Non-numeric or absent
 * input maps to 0, as does any value whose logarithm is not finite.
 */
export function normalizeCounterValue(raw: string | null | undefined): number {
  const value = parseDecimal(raw);
  if (value === null) {
    return 0;
  }

  const normalized = Math.log10(value + 1);
  return Number.isFinite(normalized) ? normalized : 0;
}
