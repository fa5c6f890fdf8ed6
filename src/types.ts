/**
 * Begend Token and AST Types
 * Source locations, error hierarchy, token kinds and the closed syntax-tree node set
 */

// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Block structure
  BEGIN: 'BEGIN',
  END: 'END',
  FUNCTION: 'FUNCTION',
  RETURN: 'RETURN',
  ENUM: 'ENUM',

  // Control flow
  IF: 'IF',
  OR: 'OR', // also logical or
  ELSE: 'ELSE',
  FOR: 'FOR',
  GOES: 'GOES',
  FROM: 'FROM',
  TO: 'TO',

  // I/O
  PRINT: 'PRINT',
  READ: 'READ',

  // Type markers
  INT: 'INT',
  REAL: 'REAL',
  BOOL: 'BOOL',

  // Literals
  INT_LITERAL: 'INT_LITERAL',
  REAL_LITERAL: 'REAL_LITERAL',
  BOOL_LITERAL: 'BOOL_LITERAL', // true | false

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Logical operators
  AND: 'AND',
  NOT: 'NOT',

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  PERCENT: 'PERCENT', // %

  // Assignment
  ARROW: 'ARROW', // ->

  // Comparison operators
  EQ: 'EQ', // =
  NE: 'NE', // !=
  LT: 'LT', // <
  LE: 'LE', // <=
  GT: 'GT', // >
  GE: 'GE', // >=

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  COMMA: 'COMMA', // ,
  COLON: 'COLON', // :
  SEMICOLON: 'SEMICOLON', // ;

  // Special
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** Literal source text of the token (empty for EOF) */
  readonly value: string;
  readonly span: SourceSpan;
}

// ============================================================
// ERROR HIERARCHY
// ============================================================

/** Error codes for programmatic handling */
export const BEGEND_ERROR_CODES = {
  // Lexer errors
  LEX_UNEXPECTED_CHARACTER: 'LEX_UNEXPECTED_CHARACTER',
  LEX_MALFORMED_NUMBER: 'LEX_MALFORMED_NUMBER',

  // Parse errors
  PARSE_UNEXPECTED_TOKEN: 'PARSE_UNEXPECTED_TOKEN',
  PARSE_EXPECTED_TYPE: 'PARSE_EXPECTED_TYPE',
  PARSE_EXPECTED_EXPRESSION: 'PARSE_EXPECTED_EXPRESSION',
  PARSE_INVALID_DIMENSION: 'PARSE_INVALID_DIMENSION',

  // Configuration errors
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type BegendErrorCode =
  (typeof BEGEND_ERROR_CODES)[keyof typeof BEGEND_ERROR_CODES];

/** Structured error data for host applications */
export interface BegendErrorData {
  readonly code: BegendErrorCode;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Base error class for all begend errors.
 * Provides structured data for callers to format as needed.
 */
export class BegendError extends Error {
  readonly code: BegendErrorCode;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: BegendErrorData) {
    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'BegendError';
    this.code = data.code;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): BegendErrorData {
    return {
      code: this.code,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by caller) */
  format(formatter?: (data: BegendErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

/**
 * Syntax errors.
 *
 * Carries the last token the parser consumed before failing and the token
 * it failed on, so a diagnostic can be rendered without re-scanning.
 */
export class ParseError extends BegendError {
  readonly lastToken: Token;
  readonly errorToken: Token;

  constructor(
    code: BegendErrorCode,
    message: string,
    lastToken: Token,
    errorToken: Token
  ) {
    super({
      code,
      message,
      location: errorToken.span.start,
      context: { expected: message, found: errorToken.value },
    });
    this.name = 'ParseError';
    this.lastToken = lastToken;
    this.errorToken = errorToken;
  }
}

/** Invalid or unreadable configuration */
export class ConfigError extends BegendError {
  readonly path: string;

  constructor(path: string, message: string) {
    super({
      code: BEGEND_ERROR_CODES.CONFIG_INVALID,
      message: `Invalid configuration in ${path}: ${message}`,
      context: { path },
    });
    this.name = 'ConfigError';
    this.path = path;
  }
}

// ============================================================
// AST NODE TYPES
// ============================================================

export type NodeType =
  | 'Program'
  | 'Enum'
  | 'EnumValue'
  | 'Function'
  | 'Param'
  | 'VarDecl'
  | 'VarDeclItem'
  | 'Assignment'
  | 'Print'
  | 'Read'
  | 'If'
  | 'OrIfBranch'
  | 'For'
  | 'Return'
  | 'Block'
  | 'ExpressionStatement'
  | 'BinaryExpr'
  | 'UnaryExpr'
  | 'Literal'
  | 'Variable'
  | 'Call'
  | 'Terminal'
  | 'NodeList';

interface BaseNode {
  /** Assigned once at construction; for display only */
  readonly id: number;
}

interface SpannedNode extends BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// HELPER NODES
// ============================================================

/** Leaf wrapping a single token under a descriptive label */
export interface TerminalNode extends BaseNode {
  readonly type: 'Terminal';
  readonly label: string;
  readonly token: Token;
}

/** Labelled grouping node over an ordered list of sibling nodes */
export interface NodeListNode<T> extends BaseNode {
  readonly type: 'NodeList';
  readonly label: string;
  readonly nodes: readonly T[];
}

// ============================================================
// PROGRAM STRUCTURE
// ============================================================

export interface ProgramNode extends SpannedNode {
  readonly type: 'Program';
  readonly functions: readonly FunctionNode[];
  readonly enums: readonly EnumNode[];
  readonly statements: readonly StatementNode[];
}

export interface EnumNode extends SpannedNode {
  readonly type: 'Enum';
  readonly name: TerminalNode;
  readonly values: NodeListNode<EnumValueNode>;
}

export interface EnumValueNode extends SpannedNode {
  readonly type: 'EnumValue';
  readonly name: TerminalNode;
}

export interface FunctionNode extends SpannedNode {
  readonly type: 'Function';
  readonly name: TerminalNode;
  readonly params: NodeListNode<ParamNode>;
  readonly returnType: TerminalNode;
  /** Usually a Block, but any single statement is allowed */
  readonly body: StatementNode;
}

export interface ParamNode extends SpannedNode {
  readonly type: 'Param';
  readonly name: TerminalNode;
  readonly paramType: TerminalNode;
}

// ============================================================
// STATEMENTS
// ============================================================

export interface VarDeclNode extends SpannedNode {
  readonly type: 'VarDecl';
  readonly varType: TerminalNode;
  readonly dimensions: NodeListNode<LiteralNode>;
  readonly variables: NodeListNode<VarDeclItemNode>;
}

export interface VarDeclItemNode extends SpannedNode {
  readonly type: 'VarDeclItem';
  readonly name: TerminalNode;
}

/** `value -> target;` */
export interface AssignmentNode extends SpannedNode {
  readonly type: 'Assignment';
  readonly value: ExpressionNode;
  readonly target: ExpressionNode;
}

export interface PrintNode extends SpannedNode {
  readonly type: 'Print';
  readonly expression: ExpressionNode;
}

export interface ReadNode extends SpannedNode {
  readonly type: 'Read';
  readonly target: ExpressionNode;
}

export interface IfNode extends SpannedNode {
  readonly type: 'If';
  readonly condition: ExpressionNode;
  readonly thenBranch: StatementNode;
  readonly orIfBranches: readonly OrIfBranchNode[];
  readonly elseBranch: StatementNode | null;
}

export interface OrIfBranchNode extends SpannedNode {
  readonly type: 'OrIfBranch';
  readonly condition: ExpressionNode;
  readonly body: StatementNode;
}

export interface ForNode extends SpannedNode {
  readonly type: 'For';
  readonly variable: TerminalNode;
  readonly from: ExpressionNode;
  readonly to: ExpressionNode;
  readonly body: StatementNode;
}

export interface ReturnNode extends SpannedNode {
  readonly type: 'Return';
  readonly expression: ExpressionNode | null;
}

export interface BlockNode extends SpannedNode {
  readonly type: 'Block';
  readonly statements: readonly StatementNode[];
}

export interface ExpressionStatementNode extends SpannedNode {
  readonly type: 'ExpressionStatement';
  readonly expression: ExpressionNode;
}

export type StatementNode =
  | VarDeclNode
  | AssignmentNode
  | PrintNode
  | ReadNode
  | IfNode
  | ForNode
  | ReturnNode
  | BlockNode
  | ExpressionStatementNode;

// ============================================================
// EXPRESSIONS
// ============================================================

export type BinaryOp =
  | 'or'
  | 'and'
  | '='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | '+'
  | '-'
  | '*'
  | '/'
  | '%';

export type UnaryOp = '-' | 'not';

export type LiteralKind = 'int' | 'real' | 'bool';

export interface BinaryExprNode extends SpannedNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly operator: TerminalNode;
  readonly right: ExpressionNode;
}

export interface UnaryExprNode extends SpannedNode {
  readonly type: 'UnaryExpr';
  readonly op: UnaryOp;
  readonly operator: TerminalNode;
  readonly operand: ExpressionNode;
}

export interface LiteralNode extends SpannedNode {
  readonly type: 'Literal';
  readonly kind: LiteralKind;
  readonly value: TerminalNode;
}

/** Scalar reference when `indices` is null, array access otherwise */
export interface VariableNode extends SpannedNode {
  readonly type: 'Variable';
  readonly name: TerminalNode;
  readonly indices: NodeListNode<ExpressionNode> | null;
}

export interface CallNode extends SpannedNode {
  readonly type: 'Call';
  readonly name: TerminalNode;
  readonly args: NodeListNode<ExpressionNode> | null;
}

export type ExpressionNode =
  | BinaryExprNode
  | UnaryExprNode
  | LiteralNode
  | VariableNode
  | CallNode;

// ============================================================
// UNION OF ALL NODES
// ============================================================

export type AstNode =
  | ProgramNode
  | EnumNode
  | EnumValueNode
  | FunctionNode
  | ParamNode
  | VarDeclItemNode
  | OrIfBranchNode
  | StatementNode
  | ExpressionNode
  | TerminalNode
  | NodeListNode<AstNode>;
