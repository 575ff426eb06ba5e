/**
 * Lexer Errors
 */

import { SableError } from '../types.js';
import type { SableErrorCode, SourceLocation } from '../types.js';

export class LexerError extends SableError {
  // Override to make location required (lexer errors always have location)
  override readonly location: SourceLocation;

  constructor(
    code: SableErrorCode,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super({ code, message, location, context });
    this.name = 'LexerError';
    this.location = location;
  }
}
