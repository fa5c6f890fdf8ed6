/**
 * Operator and Keyword Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '->': TOKEN_TYPES.ARROW,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
  '!=': TOKEN_TYPES.NE,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '%': TOKEN_TYPES.PERCENT,
  '=': TOKEN_TYPES.EQ,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  ',': TOKEN_TYPES.COMMA,
  ':': TOKEN_TYPES.COLON,
  ';': TOKEN_TYPES.SEMICOLON,
};

/** Keyword lookup table */
export const KEYWORDS: Record<string, TokenType> = {
  begin: TOKEN_TYPES.BEGIN,
  end: TOKEN_TYPES.END,
  function: TOKEN_TYPES.FUNCTION,
  return: TOKEN_TYPES.RETURN,
  enum: TOKEN_TYPES.ENUM,
  if: TOKEN_TYPES.IF,
  or: TOKEN_TYPES.OR,
  else: TOKEN_TYPES.ELSE,
  for: TOKEN_TYPES.FOR,
  goes: TOKEN_TYPES.GOES,
  from: TOKEN_TYPES.FROM,
  to: TOKEN_TYPES.TO,
  print: TOKEN_TYPES.PRINT,
  read: TOKEN_TYPES.READ,
  int: TOKEN_TYPES.INT,
  real: TOKEN_TYPES.REAL,
  bool: TOKEN_TYPES.BOOL,
  and: TOKEN_TYPES.AND,
  not: TOKEN_TYPES.NOT,
  true: TOKEN_TYPES.BOOL_LITERAL,
  false: TOKEN_TYPES.BOOL_LITERAL,
};
