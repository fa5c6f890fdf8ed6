/**
 * CLI Shared Utilities
 * Per-input processing and formatting for the begend CLI
 */

import * as fs from 'fs';
import * as path from 'path';
import { createNodeIds, type NodeIdGenerator } from './ast/ids.js';
import { printTree } from './ast/print.js';
import { serializeTree } from './ast/json.js';
import type { BegendConfig } from './config.js';
import { LexerError, tokenize } from './lexer/index.js';
import { parseTokens } from './parser/index.js';
import type { ProgramNode, Token } from './types.js';
import { ConfigError, ParseError, TOKEN_TYPES } from './types.js';

/** Program processed when no input files are given */
export const DEMO_PROGRAM = `int a; real r; bool ok;
5 -> a; 2.5 -> r; true -> ok;
if (a < 10 and not (r >= 2.0)) print(1); else print(0);`;

export const DEMO_NAME = '(inline)';

export interface SourceInput {
  readonly name: string;
  readonly source: string;
}

/** Output sinks, injectable for tests */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  writeFile(filePath: string, content: string): void;
}

export const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  writeFile: (filePath, content) => fs.writeFileSync(filePath, content, 'utf-8'),
};

// ============================================================
// FORMATTING
// ============================================================

/** `TYPE 'value' @line:col` */
export function describeToken(token: Token): string {
  const { line, column } = token.span.start;
  return `${token.type} '${token.value}' @${line}:${column}`;
}

/**
 * Token listing: one tab-separated line per token, then a count that
 * leaves out EOF.
 */
export function formatTokens(tokens: readonly Token[]): string[] {
  const lines = tokens.map((t) => {
    const { line, column } = t.span.start;
    return `${t.type}\t'${t.value}' @${line}:${column}`;
  });
  const count = tokens.filter((t) => t.type !== TOKEN_TYPES.EOF).length;
  lines.push(`Total tokens (excluding EOF): ${count}`);
  return lines;
}

/**
 * Format a failure for stderr
 *
 * @param name - Input name shown to the user
 * @param err - The error to format
 */
export function formatFailure(name: string, err: unknown): string[] {
  if (err instanceof ParseError) {
    return [
      `Syntax error in '${name}': ${err.message}`,
      `Last consumed token: ${describeToken(err.lastToken)}`,
      `Token at error: ${describeToken(err.errorToken)}`,
    ];
  }

  if (err instanceof LexerError) {
    return [`Lexical error in '${name}': ${err.message}`];
  }

  if (err instanceof ConfigError) {
    return [err.message];
  }

  // Handle file not found errors (ENOENT)
  if (
    err instanceof Error &&
    'code' in err &&
    err.code === 'ENOENT'
  ) {
    return [`Cannot read '${name}': file not found`];
  }

  return [
    `Error in '${name}': ${err instanceof Error ? err.message : String(err)}`,
  ];
}

/**
 * Format a failed JSON write. The input itself was processed; only the
 * output path is at fault.
 */
export function formatWriteFailure(outputPath: string, err: unknown): string {
  if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
    return `Cannot write '${outputPath}': directory not found`;
  }
  const reason = err instanceof Error ? err.message : String(err);
  return `Cannot write '${outputPath}': ${reason}`;
}

/** Resolve the `{name}` placeholder of a JSON output path */
export function resolveJsonPath(template: string, inputName: string): string {
  const base = path.basename(inputName, path.extname(inputName));
  return template.replaceAll('{name}', base);
}

// ============================================================
// PROCESSING
// ============================================================

/**
 * Lex, parse and render one input.
 *
 * Returns false when the input failed; the failure has already been
 * reported through `io.err`.
 */
export function processInput(
  input: SourceInput,
  config: BegendConfig,
  io: CliIO,
  ids: NodeIdGenerator = createNodeIds()
): boolean {
  const { output } = config;
  let program: ProgramNode;
  try {
    const tokens = tokenize(input.source);
    if (output.tokens) {
      io.out(`=== TOKENS for: ${input.name} ===`);
      for (const line of formatTokens(tokens)) io.out(line);
      io.out('');
    }

    program = parseTokens(tokens, { ids });
  } catch (err) {
    for (const line of formatFailure(input.name, err)) io.err(line);
    return false;
  }

  if (output.tree) {
    io.out(`=== SYNTAX TREE for: ${input.name} ===`);
    io.out(printTree(program));
    io.out('');
  }

  if (output.json !== null) {
    const jsonPath = resolveJsonPath(output.json, input.name);
    try {
      io.writeFile(jsonPath, serializeTree(program, output.indent) + '\n');
    } catch (err) {
      io.err(formatWriteFailure(jsonPath, err));
      return false;
    }
    io.out(`Syntax tree written to ${jsonPath}`);
  }
  return true;
}

/**
 * Process every input in order. A failed input does not stop the batch.
 * Node ids are unique across the whole batch.
 *
 * @returns Number of inputs that failed
 */
export function processBatch(
  inputs: readonly SourceInput[],
  config: BegendConfig,
  io: CliIO
): number {
  const ids = createNodeIds();
  let failures = 0;
  for (const input of inputs) {
    if (!processInput(input, config, io, ids)) failures++;
  }
  return failures;
}

/**
 * Read the package version from package.json
 */
export function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8')) as {
    version: string;
  };
  return packageJson.version;
}
