export const CHARS_PER_WORD = 5;
export const MS_PER_MINUTE = 60_000;

/**
 * Words per minute from cumulative totals: (chars / 5) / (ms / 60000).
 * A zero (or negative) duration yields 0 rather than dividing by zero.
 */
export function computeWpm(totalChars: number, totalDurationMs: number): number {
  if (totalDurationMs <= 0) return 0;
  const words = totalChars / CHARS_PER_WORD;
  const minutes = totalDurationMs / MS_PER_MINUTE;
  return words / minutes;
}
