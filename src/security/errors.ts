// src/security/errors.ts

import { QueryLanguage } from '../types/index.js';

export const REJECTION_KINDS = [
  'EmptyInput',
  'TooLong',
  'DangerousPattern',
  'UnbalancedQuotes',
  'UnbalancedDelimiters',
  'NestingTooDeep',
  'UnknownField',
  'UnknownFunction',
  'UnknownOperation',
  'UnsupportedOperation',
  'SqlKeywordNotAllowed',
  'InvalidVariableName',
  'TooManyVariables',
  'VariableTooLarge',
  'UnsupportedVariableType'
] as const;

export type RejectionKind = typeof REJECTION_KINDS[number];

/**
 * Raised by the validators on the first violation found.
 *
 * The query is never repaired: callers either get the trimmed input back or
 * one of these, and `kind` tells them which check failed.
 */
export class QueryValidationError extends Error {
  override readonly name = 'QueryValidationError';

  constructor(
    readonly kind: RejectionKind,
    readonly language: QueryLanguage,
    message: string,
    readonly context?: Record<string, unknown>
  ) {
    super(message);
  }

  toJSON(): { valid: false; kind: RejectionKind; language: QueryLanguage; message: string } {
    return {
      valid: false,
      kind: this.kind,
      language: this.language,
      message: this.message
    };
  }
}

export function isQueryValidationError(value: unknown): value is QueryValidationError {
  return value instanceof QueryValidationError;
}
