// src/tools/graphql/graphql-tools.ts

import { z } from 'zod';
import { Tool } from '@modelcontextprotocol/sdk/types.js';
import { GraphQLValidator } from '../../security/graphql-validator.js';
import { AuditLogger } from '../../security/audit-logger.js';
import { audited, toInputSchema } from '../audited.js';

const variablesSchema = z
  .record(z.unknown())
  .optional()
  .describe('Variables sent with the document, keyed by name without the leading $');

// Validate GraphQL
export const ValidateGraphQLSchema = z.object({
  query: z.string().describe('GraphQL request document (query or mutation)'),
  variables: variablesSchema
});

export async function validateGraphQL(
  validator: GraphQLValidator,
  auditLogger: AuditLogger | undefined,
  args: z.infer<typeof ValidateGraphQLSchema>
) {
  const { query, operation } = await audited(auditLogger, 'validate_graphql', 'graphql', args.query, () =>
    validator.inspect(args.query, args.variables)
  );

  return {
    valid: true,
    query,
    operation
  };
}

// Validate GraphQL for a single expected operation
export const ValidateGraphQLOperationSchema = z.object({
  query: z.string().describe('GraphQL request document (query or mutation)'),
  operation: z.string().describe('Operation the document must invoke, e.g. getTests or createTest'),
  variables: variablesSchema
});

export async function validateGraphQLOperation(
  validator: GraphQLValidator,
  auditLogger: AuditLogger | undefined,
  args: z.infer<typeof ValidateGraphQLOperationSchema>
) {
  const query = await audited(auditLogger, 'validate_graphql_operation', 'graphql', args.query, () =>
    validator.validateForOperation(args.query, args.operation, args.variables)
  );

  return {
    valid: true,
    query,
    operation: args.operation
  };
}

// Escape GraphQL value
export const EscapeGraphQLValueSchema = z.object({
  value: z.string().describe('Literal value to embed inside a double-quoted GraphQL string')
});

export function escapeGraphQLValue(args: z.infer<typeof EscapeGraphQLValueSchema>) {
  const escaped = GraphQLValidator.escapeStringValue(args.value);
  return {
    escaped,
    quoted: `"${escaped}"`
  };
}

export const graphqlTools: Tool[] = [
  {
    name: 'validate_graphql',
    description: 'Check a GraphQL query or mutation and its variables against the operation and field whitelist. Introspection, subscriptions and over-deep documents are rejected.',
    inputSchema: toInputSchema(ValidateGraphQLSchema)
  },
  {
    name: 'validate_graphql_operation',
    description: 'Like validate_graphql, and additionally require the document to invoke one expected, whitelisted operation.',
    inputSchema: toInputSchema(ValidateGraphQLOperationSchema)
  },
  {
    name: 'escape_graphql_value',
    description: 'Escape a user-supplied literal so it can be placed inside a double-quoted GraphQL string.',
    inputSchema: toInputSchema(EscapeGraphQLValueSchema)
  }
];
