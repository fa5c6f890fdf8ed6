/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { NodeIdGenerator } from '../ast/ids.js';
import type { ProgramNode, Token } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser that converts tokens into a syntax tree.
 *
 * Methods are organized across multiple files:
 * - parser-program.ts: Program, function and enum declarations
 * - parser-statements.ts: Statements, declarations, blocks
 * - parser-control.ts: If and for statements
 * - parser-expr.ts: Expressions, precedence chain, primaries
 *
 * Parsing is fail-fast: the first syntax error is thrown as a ParseError
 * and no partial tree is returned.
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokenize(source));
 * const program = parser.parse();
 * ```
 */
export class Parser {
  /** Parser state including tokens, position, and id source */
  state: ParserState;

  constructor(tokens: readonly Token[], options?: { ids?: NodeIdGenerator }) {
    this.state = createParserState(tokens, options);
  }

  /**
   * Parse tokens into a complete Program node.
   */
  parse(): ProgramNode {
    return this.parseProgram();
  }

  /** Next node id from this run's generator */
  nextId(): number {
    return this.state.ids.next();
  }
}
