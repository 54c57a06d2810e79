// src/tools/jql/jql-tools.ts

import { z } from 'zod';
import { Tool } from '@modelcontextprotocol/sdk/types.js';
import { JQLValidator } from '../../security/jql-validator.js';
import { AuditLogger } from '../../security/audit-logger.js';
import { audited, toInputSchema } from '../audited.js';

// Validate JQL
export const ValidateJqlSchema = z.object({
  jql: z.string().describe('JQL filter to check, e.g. project = "TEST" AND status = "Open"')
});

export async function validateJql(
  validator: JQLValidator,
  auditLogger: AuditLogger | undefined,
  args: z.infer<typeof ValidateJqlSchema>
) {
  const analysis = await audited(auditLogger, 'validate_jql', 'jql', args.jql, () => validator.analyze(args.jql));

  return {
    valid: true,
    ...analysis,
    message: `JQL accepted (${analysis.fields.length} field(s), ${analysis.functions.length} function(s), depth ${analysis.depth}).`
  };
}

// Escape JQL value
export const EscapeJqlValueSchema = z.object({
  value: z.string().describe('Literal value to embed inside a double-quoted JQL string')
});

export function escapeJqlValue(args: z.infer<typeof EscapeJqlValueSchema>) {
  const escaped = JQLValidator.escapeStringValue(args.value);
  return {
    escaped,
    quoted: `"${escaped}"`
  };
}

export const jqlTools: Tool[] = [
  {
    name: 'validate_jql',
    description: 'Check a JQL filter against the field, function and operator whitelist before it is sent to the remote API. Returns the trimmed query or the reason it was rejected.',
    inputSchema: toInputSchema(ValidateJqlSchema)
  },
  {
    name: 'escape_jql_value',
    description: 'Escape a user-supplied literal so it can be placed inside a double-quoted JQL string.',
    inputSchema: toInputSchema(EscapeJqlValueSchema)
  }
];
