/**
 * Lexer State
 * Cursor over begend source with line and column bookkeeping
 */

import type { SourceLocation } from '../types.js';

export interface LexerState {
  readonly source: string;
  /** 0-based offset of the next unread character */
  pos: number;
  line: number;
  column: number;
}

export function createLexerState(source: string): LexerState {
  return { source, pos: 0, line: 1, column: 1 };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

/** Character `offset` places past the cursor; '' beyond the end */
export function peek(state: LexerState, offset = 0): string {
  return state.source.charAt(state.pos + offset);
}

/** Whether the unread input starts with `text` */
export function lookingAt(state: LexerState, text: string): boolean {
  return state.source.startsWith(text, state.pos);
}

/** Consume one character. Only LF starts a new line. */
export function advance(state: LexerState): string {
  const ch = peek(state);
  if (ch === '') return ch;
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

/** Consume `count` characters and return them */
export function advanceBy(state: LexerState, count: number): string {
  let text = '';
  for (let i = 0; i < count; i++) text += advance(state);
  return text;
}

/** Consume characters while `predicate` holds and return them */
export function advanceWhile(
  state: LexerState,
  predicate: (ch: string) => boolean
): string {
  let text = '';
  while (!isAtEnd(state) && predicate(peek(state))) {
    text += advance(state);
  }
  return text;
}
