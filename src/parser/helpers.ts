/**
 * Parser Helpers
 * Lookahead predicates and token classification tables
 * @internal This module contains internal parser utilities
 */

import type { BinaryOp, LiteralKind, TokenType, UnaryOp } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { type ParserState, check, peek } from './state.js';

// ============================================================
// TOKEN CLASSES
// ============================================================

/** @internal */
export const TYPE_TOKENS: readonly TokenType[] = [
  TOKEN_TYPES.INT,
  TOKEN_TYPES.REAL,
  TOKEN_TYPES.BOOL,
];

/** @internal */
export const LITERAL_KINDS: Partial<Record<TokenType, LiteralKind>> = {
  [TOKEN_TYPES.INT_LITERAL]: 'int',
  [TOKEN_TYPES.REAL_LITERAL]: 'real',
  [TOKEN_TYPES.BOOL_LITERAL]: 'bool',
};

/** @internal */
export const BINARY_OPERATORS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.OR]: 'or',
  [TOKEN_TYPES.AND]: 'and',
  [TOKEN_TYPES.EQ]: '=',
  [TOKEN_TYPES.NE]: '!=',
  [TOKEN_TYPES.LT]: '<',
  [TOKEN_TYPES.LE]: '<=',
  [TOKEN_TYPES.GT]: '>',
  [TOKEN_TYPES.GE]: '>=',
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
  [TOKEN_TYPES.STAR]: '*',
  [TOKEN_TYPES.SLASH]: '/',
  [TOKEN_TYPES.PERCENT]: '%',
};

/** @internal */
export const UNARY_OPERATORS: Partial<Record<TokenType, UnaryOp>> = {
  [TOKEN_TYPES.MINUS]: '-',
  [TOKEN_TYPES.NOT]: 'not',
};

/**
 * Tokens after an enum's closing brace that make its ';' optional.
 * @internal
 */
export const ENUM_TERMINATOR_OPTIONAL_BEFORE: readonly TokenType[] = [
  TOKEN_TYPES.EOF,
  TOKEN_TYPES.FUNCTION,
  TOKEN_TYPES.ENUM,
  ...TYPE_TOKENS,
];

/**
 * Tokens that end a bare `return` (no expression).
 * @internal
 */
export const RETURN_VALUE_ABSENT_BEFORE: readonly TokenType[] = [
  TOKEN_TYPES.SEMICOLON,
  TOKEN_TYPES.END,
  TOKEN_TYPES.EOF,
  TOKEN_TYPES.ELSE,
  TOKEN_TYPES.OR,
];

// ============================================================
// LOOKAHEAD PREDICATES
// ============================================================

/**
 * Check for function declaration: function or begin function
 * @internal
 */
export function isFunctionStart(state: ParserState): boolean {
  return (
    check(state, TOKEN_TYPES.FUNCTION) ||
    (check(state, TOKEN_TYPES.BEGIN) &&
      peek(state, 1).type === TOKEN_TYPES.FUNCTION)
  );
}

/**
 * Check for begin-wrapped statement: begin if / begin for
 * @internal
 */
export function isBeginWrapped(
  state: ParserState,
  keyword: typeof TOKEN_TYPES.IF | typeof TOKEN_TYPES.FOR
): boolean {
  return check(state, TOKEN_TYPES.BEGIN) && peek(state, 1).type === keyword;
}

/**
 * Check for type marker: int, real, bool
 * @internal
 */
export function isTypeStart(state: ParserState): boolean {
  return check(state, ...TYPE_TOKENS);
}
