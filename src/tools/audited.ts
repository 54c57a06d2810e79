// src/tools/audited.ts

import { zodToJsonSchema } from 'zod-to-json-schema';
import { z } from 'zod';
import { Tool } from '@modelcontextprotocol/sdk/types.js';
import { logger } from '../config/logger.js';
import { AuditLogger } from '../security/audit-logger.js';
import { isQueryValidationError } from '../security/errors.js';
import { QueryLanguage } from '../types/index.js';

export function toInputSchema(schema: z.ZodTypeAny): Tool['inputSchema'] {
  return { ...zodToJsonSchema(schema), type: 'object' };
}

/**
 * Runs one validation for a tool call, logging and auditing the outcome.
 * Rejections are rethrown unchanged for the server to turn into a tool error.
 */
export async function audited<T>(
  auditLogger: AuditLogger | undefined,
  operation: string,
  language: QueryLanguage,
  query: string,
  validate: () => T
): Promise<T> {
  try {
    const result = validate();
    await auditLogger?.log({ operation, language, query, success: true });
    return result;
  } catch (error) {
    if (isQueryValidationError(error)) {
      logger.warn(`${operation} rejected input`, { kind: error.kind, reason: error.message, ...error.context });
      await auditLogger?.log({
        operation,
        language,
        query,
        success: false,
        rejection: { kind: error.kind, message: error.message }
      });
    }
    throw error;
  }
}
