/**
 * General-purpose utility functions used across every module.
 * All functions are pure (no side effects, no I/O).
 */

// ---------------------------------------------------------------------------
// String utilities
// ---------------------------------------------------------------------------

/** True for undefined, null, empty and whitespace-only strings. */
export function isBlank(text: string | null | undefined): boolean {
  return text === undefined || text === null || text.trim().length === 0;
}

/**
 * Splits a comma-separated list, trimming entries and dropping blanks.
 * Example: " tk, xyz,,top " -> ["tk", "xyz", "top"]
 */
export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

// ---------------------------------------------------------------------------
// Fixed-point scores
// ---------------------------------------------------------------------------

/**
 * Converts a two-decimal score (0.85) into integer hundredths (85) so that
 * sums and comparisons never drift.
 */
export function toHundredths(value: number): number {
  return Math.round(value * 100);
}

/** Inverse of `toHundredths`. */
export function fromHundredths(hundredths: number): number {
  return Number((hundredths / 100).toFixed(2));
}

// ---------------------------------------------------------------------------
// Date utilities
// ---------------------------------------------------------------------------

/** Returns a new Date `ms` milliseconds after `date`. */
export function addMs(date: Date, ms: number): Date {
  return new Date(date.getTime() + ms);
}
