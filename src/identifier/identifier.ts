/** Character used to hide the tail of an identifier in logs and emails. */
export const MASK_CHAR = "*";

/** Number of leading characters left visible by {@link maskIdentifier}. */
export const VISIBLE_PREFIX = 4;

const DIGITS = /^\d+$/;
const CHECK_CHAR = /^[\dk]$/i;

/**
 * True when the token is 7–8 digits followed by a check character
 * (a digit or `k`, any case). No dots, no dash.
 */
export function isValidIdentifier(token: string): boolean {
  if (token.length < 8 || token.length > 9) return false;
  const body = token.slice(0, -1);
  const check = token.slice(-1);
  return DIGITS.test(body) && CHECK_CHAR.test(check);
}

/**
 * Hide everything but the first four characters, preserving length.
 *
 * @example
 * maskIdentifier("12345678k") // => "1234*****"
 */
export function maskIdentifier(token: string): string {
  if (token.length <= VISIBLE_PREFIX) return MASK_CHAR.repeat(token.length);
  return token.slice(0, VISIBLE_PREFIX) + MASK_CHAR.repeat(token.length - VISIBLE_PREFIX);
}

/** Case-insensitive membership in the skip list. */
export function isException(token: string, exceptions: readonly string[]): boolean {
  const needle = token.toLowerCase();
  return exceptions.some((e) => e.toLowerCase() === needle);
}

/**
 * Whether two tokens name the same person, ignoring case and a trailing
 * `k` check character.
 */
export function sameIdentifier(a: string, b: string): boolean {
  return stripCheck(a) === stripCheck(b);
}

function stripCheck(token: string): string {
  return token.toLowerCase().replace(/k$/, "");
}
