/**
 * Character and token helpers shared by the pipeline stages.
 */

const LETTER = /\p{L}/u;
const ALPHANUMERIC = /^[\p{L}\p{N}]$/u;
const WHITESPACE_RUN = /\s+/;
const TOKEN = /\S+/g;

export interface Token {
  text: string;
  /** Offset of the token's first character in the string it came from */
  start: number;
}

/**
 * True for a single Unicode letter or number
 */
export function isAlphanumeric(char: string | undefined): boolean {
  return char !== undefined && ALPHANUMERIC.test(char);
}

/**
 * True when the string contains at least one Unicode letter
 */
export function hasLetter(str: string): boolean {
  return LETTER.test(str);
}

/**
 * Split on whitespace runs, ignoring leading and trailing whitespace
 */
export function splitWords(str: string): string[] {
  const trimmed = str.trim();
  return trimmed ? trimmed.split(WHITESPACE_RUN) : [];
}

/**
 * Whitespace tokens together with their offsets
 */
export function tokenizeWithOffsets(str: string): Token[] {
  const tokens: Token[] = [];
  for (const match of str.matchAll(TOKEN)) {
    tokens.push({ text: match[0], start: match.index ?? 0 });
  }
  return tokens;
}

/**
 * Count non-overlapping occurrences of `needle` in `haystack`
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  return haystack.split(needle).length - 1;
}
