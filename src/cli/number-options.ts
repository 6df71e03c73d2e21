/** Option parsers for the one-shot commands; commander hands every value over as a string. */

export function parseNumberOption(flag: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new Error(`${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

export function parseIntegerOption(flag: string, value: string): number {
  const parsed = parseNumberOption(flag, value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${flag} expects an integer, got "${value}"`);
  }
  return parsed;
}
