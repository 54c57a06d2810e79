// src/server.ts

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  CallToolResult,
  ListToolsRequestSchema
} from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { JQLValidator } from './security/jql-validator.js';
import { GraphQLValidator } from './security/graphql-validator.js';
import { AuditLogger } from './security/audit-logger.js';
import { isQueryValidationError } from './security/errors.js';
import { ServerConfig } from './types/index.js';
import { logger } from './config/logger.js';

// Import tools
import { jqlTools, validateJql, ValidateJqlSchema, escapeJqlValue, EscapeJqlValueSchema } from './tools/jql/jql-tools.js';
import {
  graphqlTools,
  validateGraphQL,
  ValidateGraphQLSchema,
  validateGraphQLOperation,
  ValidateGraphQLOperationSchema,
  escapeGraphQLValue,
  EscapeGraphQLValueSchema
} from './tools/graphql/graphql-tools.js';

function textResult(payload: unknown, isError = false): CallToolResult {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(payload, null, 2)
    }],
    ...(isError ? { isError: true } : {})
  };
}

export class QueryFirewallServer {
  private server: Server;
  private jqlValidator: JQLValidator;
  private graphqlValidator: GraphQLValidator;
  private auditLogger?: AuditLogger;

  constructor(private config: ServerConfig) {
    this.server = new Server(
      {
        name: 'query-firewall-mcp',
        version: '1.0.0'
      },
      {
        capabilities: {
          tools: {}
        }
      }
    );

    this.jqlValidator = new JQLValidator(config.jql);
    this.graphqlValidator = new GraphQLValidator(config.graphql);

    if (config.audit.enabled) {
      this.auditLogger = new AuditLogger(config.audit.logPath);
    }

    this.setupHandlers();
  }

  private setupHandlers(): void {
    // List available tools
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: [...jqlTools, ...graphqlTools]
    }));

    // Handle tool execution
    this.server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
      const { name, arguments: args = {} } = request.params;

      try {
        switch (name) {
          case 'validate_jql':
            return textResult(await validateJql(this.jqlValidator, this.auditLogger, ValidateJqlSchema.parse(args)));

          case 'escape_jql_value':
            return textResult(escapeJqlValue(EscapeJqlValueSchema.parse(args)));

          case 'validate_graphql':
            return textResult(await validateGraphQL(
              this.graphqlValidator,
              this.auditLogger,
              ValidateGraphQLSchema.parse(args)
            ));

          case 'validate_graphql_operation':
            return textResult(await validateGraphQLOperation(
              this.graphqlValidator,
              this.auditLogger,
              ValidateGraphQLOperationSchema.parse(args)
            ));

          case 'escape_graphql_value':
            return textResult(escapeGraphQLValue(EscapeGraphQLValueSchema.parse(args)));

          default:
            throw new Error(`Unknown tool: ${name}`);
        }
      } catch (error) {
        // Rejections are an expected outcome; the tool layer already logged them
        if (isQueryValidationError(error)) {
          return textResult(error.toJSON(), true);
        }

        const message = error instanceof ZodError
          ? `Invalid arguments: ${error.issues.map(issue => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; ')}`
          : error instanceof Error ? error.message : String(error);

        logger.error(`Tool execution failed: ${name}`, { error: message });
        return {
          content: [{
            type: 'text',
            text: `Error: ${message}`
          }],
          isError: true
        };
      }
    });
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async start(): Promise<void> {
    await this.connect(new StdioServerTransport());
    logger.info('Query firewall MCP server started', {
      auditLog: this.config.audit.enabled ? this.config.audit.logPath : 'disabled'
    });
  }

  async stop(): Promise<void> {
    await this.server.close();
    if (this.auditLogger) {
      await this.auditLogger.close();
    }
    logger.info('Query firewall MCP server stopped');
  }
}
