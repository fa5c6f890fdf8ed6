/**
 * Lexer Errors
 */

import { BegendError } from '../types.js';
import type { BegendErrorCode, SourceLocation } from '../types.js';

export class LexerError extends BegendError {
  // Override to make location required (lexer errors always have location)
  override readonly location: SourceLocation;

  constructor(
    code: BegendErrorCode,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super({ code, message, location, context });
    this.name = 'LexerError';
    this.location = location;
  }
}
