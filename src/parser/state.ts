/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { NodeIdGenerator } from '../ast/ids.js';
import { createNodeIds } from '../ast/ids.js';
import type {
  BegendErrorCode,
  SourceLocation,
  SourceSpan,
  Token,
  TokenType,
} from '../types.js';
import { BEGEND_ERROR_CODES, ParseError, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: readonly Token[];
  pos: number;
  /** Id source for every node built during this run */
  readonly ids: NodeIdGenerator;
  /** Last token consumed by advance(), null before the first */
  lastConsumed: Token | null;
}

export interface ParserStateOptions {
  /** Shared id generator; a fresh one starting at 1 when omitted */
  ids?: NodeIdGenerator;
}

export function createParserState(
  tokens: readonly Token[],
  options: ParserStateOptions = {}
): ParserState {
  return {
    tokens,
    pos: 0,
    ids: options.ids ?? createNodeIds(),
    lastConsumed: null,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  const token = state.tokens[state.pos];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) {
    state.pos++;
    state.lastConsumed = token;
  }
  return token;
}

/**
 * Consume the current token if it is one of `types`.
 * @internal
 */
export function match(state: ParserState, ...types: TokenType[]): Token | null {
  return check(state, ...types) ? advance(state) : null;
}

/** @internal */
export function expect(
  state: ParserState,
  type: TokenType,
  message: string
): Token {
  if (check(state, type)) return advance(state);
  const hint = generateHint(type, current(state));
  throw fail(state, hint ? `${message}. ${hint}` : message);
}

/**
 * Build the error for a failed expectation at the current position.
 *
 * The offending token is the lookahead, or the last consumed token once
 * input is exhausted.
 * @internal
 */
export function fail(
  state: ParserState,
  message: string,
  code: BegendErrorCode = BEGEND_ERROR_CODES.PARSE_UNEXPECTED_TOKEN
): ParseError {
  const lookahead = current(state);
  const errorToken =
    isAtEnd(state) && state.lastConsumed ? state.lastConsumed : lookahead;
  const lastToken = state.lastConsumed ?? state.tokens[0] ?? errorToken;
  return new ParseError(code, message, lastToken, errorToken);
}

// ============================================================
// ERROR HINTS
// ============================================================

/**
 * Generate contextual hints for common parse errors.
 * @internal
 */
function generateHint(
  expectedType: TokenType,
  actualToken: Token
): string | null {
  const actual = actualToken.type;

  if (actual === TOKEN_TYPES.EOF) {
    switch (expectedType) {
      case TOKEN_TYPES.RPAREN:
        return 'Hint: Check for unclosed parenthesis';
      case TOKEN_TYPES.RBRACKET:
        return 'Hint: Check for unclosed bracket';
      case TOKEN_TYPES.RBRACE:
        return 'Hint: Check for unclosed brace';
      case TOKEN_TYPES.END:
        return "Hint: Check for a 'begin' without matching 'end'";
      default:
        return null;
    }
  }

  // Hint for a statement that ran into the next line
  if (
    expectedType === TOKEN_TYPES.SEMICOLON &&
    (actual === TOKEN_TYPES.IDENTIFIER || actual === TOKEN_TYPES.PRINT)
  ) {
    return "Hint: Missing ';' at end of statement";
  }

  return null;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/**
 * Span from `start` to the end of the last consumed token.
 * @internal
 */
export function spanFrom(state: ParserState, start: SourceLocation): SourceSpan {
  const end = state.lastConsumed?.span.end ?? current(state).span.start;
  return makeSpan(start, end);
}
