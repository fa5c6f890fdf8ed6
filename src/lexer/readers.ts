/**
 * Token Readers
 * Multi-character tokens: numbers, words and operators
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { BEGEND_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import { isDigit, isIdentifierChar } from './chars.js';
import { LexerError } from './errors.js';
import {
  KEYWORDS,
  SINGLE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
import {
  advance,
  advanceBy,
  advanceWhile,
  currentLocation,
  type LexerState,
  peek,
} from './state.js';

/** Token from `start` up to the cursor */
export function makeToken(
  state: LexerState,
  type: TokenType,
  value: string,
  start: SourceLocation
): Token {
  return { type, value, span: { start, end: currentLocation(state) } };
}

/**
 * digits → INT_LITERAL, digits "." digits → REAL_LITERAL.
 * A '.' must be followed by at least one digit.
 */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  const whole = advanceWhile(state, isDigit);
  if (peek(state) !== '.') {
    return makeToken(state, TOKEN_TYPES.INT_LITERAL, whole, start);
  }

  const value = whole + advance(state);
  if (!isDigit(peek(state))) {
    throw new LexerError(
      BEGEND_ERROR_CODES.LEX_MALFORMED_NUMBER,
      `Malformed number '${value}': expected digit after '.'`,
      start
    );
  }
  const fraction = advanceWhile(state, isDigit);
  return makeToken(state, TOKEN_TYPES.REAL_LITERAL, value + fraction, start);
}

/** Identifier or reserved word */
export function readWord(state: LexerState): Token {
  const start = currentLocation(state);
  const word = advanceWhile(state, isIdentifierChar);
  const keyword = Object.hasOwn(KEYWORDS, word) ? KEYWORDS[word] : undefined;
  return makeToken(state, keyword ?? TOKEN_TYPES.IDENTIFIER, word, start);
}

/**
 * Operator or punctuation at the cursor, longest match first.
 * Returns null when no operator starts here.
 */
export function readOperator(state: LexerState): Token | null {
  const start = currentLocation(state);
  const pair = peek(state) + peek(state, 1);
  const twoChar = TWO_CHAR_OPERATORS[pair];
  if (twoChar !== undefined) {
    return makeToken(state, twoChar, advanceBy(state, 2), start);
  }
  const single = SINGLE_CHAR_OPERATORS[peek(state)];
  if (single !== undefined) {
    return makeToken(state, single, advance(state), start);
  }
  return null;
}
