const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Parses a whole number typed at a prompt.
 *
 * Accepts an optional leading minus and digits only, ignoring surrounding
 * whitespace. Values outside the safe integer range are rejected.
 *
 * @returns The number, or null when the text is not a whole number
 */
export function parseInteger(raw: string): number | null {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return null;
  }

  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : null;
}
