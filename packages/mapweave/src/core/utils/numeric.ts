/**
 * Numeric Text
 *
 * Cells stay text until a consumer needs a number (coordinates, aggregate
 * values). Join keys are never parsed.
 */

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Finite decimal number in `text`, surrounding whitespace ignored
 *
 * Hex, `Infinity`, thousands separators and the like are not numbers here.
 */
export function parseNumericText(text: string): number | undefined {
  const trimmed = text.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}
