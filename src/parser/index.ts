/**
 * Begend Parser
 * Main entry point and re-exports
 */

import type { NodeIdGenerator } from '../ast/ids.js';
import { tokenize } from '../lexer/index.js';
import type { ProgramNode, Token } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-program.js';
import './parser-statements.js';
import './parser-control.js';
import './parser-expr.js';

export interface ParseOptions {
  /** Id source shared across parses; each parse starts at 1 when omitted */
  ids?: NodeIdGenerator;
}

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse an already-lexed token sequence (ending in EOF) into a Program.
 *
 * Throws ParseError on the first syntax error.
 */
export function parseTokens(
  tokens: readonly Token[],
  options: ParseOptions = {}
): ProgramNode {
  return new Parser(tokens, options).parse();
}

/**
 * Lex and parse begend source code.
 *
 * Throws LexerError or ParseError on the first error.
 *
 * @example
 * ```typescript
 * const program = parse('int a; 5 -> a; print(a);');
 * ```
 */
export function parse(source: string, options: ParseOptions = {}): ProgramNode {
  return parseTokens(tokenize(source), options);
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export { createParserState, type ParserState } from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';
