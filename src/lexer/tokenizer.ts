/**
 * Tokenizer
 * Trivia skipping and token dispatch
 */

import type { Token } from '../types.js';
import { BEGEND_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import { isDigit, isIdentifierStart, isWhitespace } from './chars.js';
import { LexerError } from './errors.js';
import { makeToken, readNumber, readOperator, readWord } from './readers.js';
import {
  advance,
  advanceBy,
  advanceWhile,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  lookingAt,
  peek,
} from './state.js';

/** Unterminated block comments run to end of input */
function skipBlockComment(state: LexerState): void {
  advanceBy(state, 2);
  while (!isAtEnd(state) && !lookingAt(state, '*/')) {
    advance(state);
  }
  advanceBy(state, 2);
}

/** Skip whitespace and comments in any order */
function skipTrivia(state: LexerState): void {
  for (;;) {
    advanceWhile(state, isWhitespace);
    if (lookingAt(state, '//')) {
      advanceWhile(state, (ch) => ch !== '\n');
    } else if (lookingAt(state, '/*')) {
      skipBlockComment(state);
    } else {
      return;
    }
  }
}

export function nextToken(state: LexerState): Token {
  skipTrivia(state);

  const start = currentLocation(state);
  if (isAtEnd(state)) {
    return makeToken(state, TOKEN_TYPES.EOF, '', start);
  }

  const ch = peek(state);
  if (isDigit(ch)) return readNumber(state);
  if (isIdentifierStart(ch)) return readWord(state);

  const operator = readOperator(state);
  if (operator) return operator;

  throw new LexerError(
    BEGEND_ERROR_CODES.LEX_UNEXPECTED_CHARACTER,
    `Unexpected character: ${ch}`,
    start
  );
}

/**
 * Convert source text into tokens.
 * The returned list always ends with a single EOF token.
 */
export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  for (;;) {
    const token = nextToken(state);
    tokens.push(token);
    if (token.type === TOKEN_TYPES.EOF) return tokens;
  }
}
