/**
 * Character classes of begend source text
 */

export function isDigit(ch: string): boolean {
  return ch.length === 1 && ch >= '0' && ch <= '9';
}

/** Any Unicode letter or underscore */
export function isIdentifierStart(ch: string): boolean {
  return /^[\p{L}_]$/u.test(ch);
}

export function isIdentifierChar(ch: string): boolean {
  return /^[\p{L}\p{Nd}_]$/u.test(ch);
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}
