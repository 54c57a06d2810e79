// src/security/graphql-validator.ts

import { DEFAULT_GRAPHQL_CONFIG } from '../config/defaults.js';
import { GraphQLConfig, OperationHeader, OperationType, VariableValue } from '../types/index.js';
import { QueryValidationError } from './errors.js';
import { GraphQLToken, tokenizeGraphQL } from './graphql-lexer.js';
import { findDangerousPattern, GRAPHQL_DANGEROUS_PATTERNS } from './patterns.js';
import { StructuralValidator } from './structural-validator.js';
import { buildGraphQLWhitelist, GraphQLWhitelist } from './whitelist.js';

const VARIABLE_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;
const OPERATION_KEYWORDS: ReadonlySet<string> = new Set(['query', 'mutation', 'subscription']);

export interface GraphQLInspection {
  query: string;
  operation: OperationHeader;
  variables?: Record<string, VariableValue>;
}

/**
 * Whitelist validator for GraphQL request documents.
 *
 * Only query and mutation operations are accepted. Names in selections must
 * be known fields or operations; capitalised names are let through as type or
 * enum references unless they look suspicious.
 *
 * @example
 * const validator = new GraphQLValidator();
 * validator.validateQuery(
 *   'query GetTest($issueId: String!) { getTest(issueId: $issueId) { issueId jira } }',
 *   { issueId: 'TEST-123' }
 * );
 */
export class GraphQLValidator {
  private readonly whitelist: GraphQLWhitelist;
  private readonly structural: StructuralValidator;

  constructor(private readonly config: GraphQLConfig = DEFAULT_GRAPHQL_CONFIG) {
    this.whitelist = buildGraphQLWhitelist(config.extras);
    this.structural = new StructuralValidator({
      language: 'graphql',
      delimiters: [['{', '}']],
      maxDepth: config.limits.maxDepth,
      blockStrings: true,
      lineComment: '#'
    });
  }

  validateQuery(document: string, variables?: Record<string, unknown>): string {
    return this.inspect(document, variables).query;
  }

  /**
   * Runs every check of {@link validateQuery} and also returns the detected
   * operation header and the variables narrowed to {@link VariableValue}.
   */
  inspect(document: string, variables?: Record<string, unknown>): GraphQLInspection {
    const { maxLength } = this.config.limits;

    if (!document || !document.trim()) {
      throw new QueryValidationError('EmptyInput', 'graphql', 'GraphQL query cannot be empty');
    }
    if (document.length > maxLength) {
      throw new QueryValidationError('TooLong', 'graphql', `GraphQL query too long (max ${maxLength} characters)`, {
        length: document.length,
        maxLength
      });
    }

    const dangerous = findDangerousPattern(document, GRAPHQL_DANGEROUS_PATTERNS);
    if (dangerous) {
      throw new QueryValidationError(
        'DangerousPattern',
        'graphql',
        `GraphQL query contains a dangerous pattern: ${dangerous.label}`,
        { pattern: dangerous.label }
      );
    }

    const tokens = tokenizeGraphQL(document);
    const operation = parseOperationHeader(tokens);

    this.structural.validate(document);
    this.validateNames(tokens, operation.type);

    const inspection: GraphQLInspection = { query: document.trim(), operation };
    if (variables) {
      inspection.variables = this.validateVariables(variables);
    }
    return inspection;
  }

  /**
   * Validates like {@link validateQuery}, then requires `expectedOperation` to
   * be invoked by the document and to be whitelisted for its operation type.
   */
  validateForOperation(document: string, expectedOperation: string, variables?: Record<string, unknown>): string {
    const { query, operation } = this.inspect(document, variables);

    const invoked = tokenizeGraphQL(query).some(token => token.kind === 'name' && token.text === expectedOperation);
    if (!invoked) {
      throw new QueryValidationError(
        'UnknownOperation',
        'graphql',
        `Query does not contain expected operation: ${expectedOperation}`,
        { operation: expectedOperation }
      );
    }

    if (!this.operationsFor(operation.type).has(expectedOperation)) {
      throw new QueryValidationError('UnknownOperation', 'graphql', `Unknown ${operation.type}: ${expectedOperation}`, {
        operation: expectedOperation
      });
    }

    return query;
  }

  private validateNames(tokens: GraphQLToken[], operationType: OperationType): void {
    tokens.forEach((token, index) => {
      if (token.kind === 'string' && !token.terminated) {
        throw new QueryValidationError('UnbalancedQuotes', 'graphql', 'Unterminated string literal in GraphQL query', {
          position: token.position
        });
      }
      if (token.kind !== 'name') {
        return;
      }

      const previous = tokens[index - 1];
      if (previous?.kind === 'punctuator' && previous.text === '@') {
        if (!this.whitelist.directives.has(token.text)) {
          throw new QueryValidationError('UnknownField', 'graphql', `Unknown or disallowed directive: @${token.text}`, {
            directive: token.text
          });
        }
        return;
      }

      // Argument names, aliases and input object keys
      const next = tokens[index + 1];
      if (next?.kind === 'punctuator' && next.text === ':') {
        return;
      }

      if (!this.isAllowedName(token.text, operationType)) {
        throw new QueryValidationError('UnknownField', 'graphql', `Unknown or disallowed field: ${token.text}`, {
          field: token.text
        });
      }
    });
  }

  private isAllowedName(name: string, operationType: OperationType): boolean {
    if (this.whitelist.fields.has(name) || this.whitelist.keywords.has(name)) {
      return true;
    }
    if (this.operationsFor(operationType).has(name)) {
      return true;
    }
    // Type names and enum values
    return /^[A-Z]/.test(name) && !this.isSuspicious(name);
  }

  private isSuspicious(name: string): boolean {
    const lowered = name.toLowerCase();
    return this.whitelist.suspiciousSubstrings.some(substring => lowered.includes(substring));
  }

  private operationsFor(type: OperationType): ReadonlySet<string> {
    return type === 'mutation' ? this.whitelist.mutations : this.whitelist.queries;
  }

  private validateVariables(variables: Record<string, unknown>): Record<string, VariableValue> {
    const { maxVariables } = this.config.limits;
    const entries = Object.entries(variables);

    if (entries.length > maxVariables) {
      throw new QueryValidationError('TooManyVariables', 'graphql', `Too many variables (max ${maxVariables})`, {
        count: entries.length,
        maxVariables
      });
    }

    // fromEntries defines own properties, so a JSON `__proto__` key stays a plain key
    return Object.fromEntries(
      entries.map(([name, value]): [string, VariableValue] => {
        if (!VARIABLE_NAME.test(name)) {
          throw new QueryValidationError('InvalidVariableName', 'graphql', `Invalid variable name: ${name}`, {
            variable: name
          });
        }
        return [name, this.validateVariableValue(name, value, 1)];
      })
    );
  }

  private validateVariableValue(path: string, value: unknown, depth: number): VariableValue {
    const { maxStringLength, maxListLength, maxObjectKeys, maxDepth } = this.config.limits;

    if (value === null || typeof value === 'number' || typeof value === 'boolean') {
      return value;
    }

    if (typeof value === 'string') {
      if (value.length > maxStringLength) {
        throw tooLarge(path, `string value too long (max ${maxStringLength} characters)`);
      }
      const dangerous = findDangerousPattern(value, GRAPHQL_DANGEROUS_PATTERNS);
      if (dangerous) {
        throw new QueryValidationError(
          'DangerousPattern',
          'graphql',
          `Variable '${path}' contains a dangerous pattern: ${dangerous.label}`,
          { variable: path, pattern: dangerous.label }
        );
      }
      return value;
    }

    // Arrays and objects nest; cap the walk at the document depth limit.
    if (depth > maxDepth && (Array.isArray(value) || isPlainObject(value))) {
      throw tooLarge(path, `nested too deeply (max ${maxDepth} levels)`);
    }

    if (Array.isArray(value)) {
      if (value.length > maxListLength) {
        throw tooLarge(path, `array too large (max ${maxListLength} items)`);
      }
      return value.map((item: unknown, index) => this.validateVariableValue(`${path}[${index}]`, item, depth + 1));
    }

    if (isPlainObject(value)) {
      const entries = Object.entries(value);
      if (entries.length > maxObjectKeys) {
        throw tooLarge(path, `object too large (max ${maxObjectKeys} keys)`);
      }
      return Object.fromEntries(
        entries.map(([key, item]): [string, VariableValue] => [
          key,
          this.validateVariableValue(`${path}.${key}`, item, depth + 1)
        ])
      );
    }

    throw new QueryValidationError(
      'UnsupportedVariableType',
      'graphql',
      `Variable '${path}' has unsupported type: ${describeType(value)}`,
      { variable: path }
    );
  }

  /**
   * Escapes a value for a double-quoted GraphQL string literal. Newline,
   * carriage return and tab are escaped; other control characters are dropped.
   */
  static escapeStringValue(value: string): string {
    return value
      .replace(/\\/g, '\\\\')
      .replace(/"/g, '\\"')
      .replace(/\n/g, '\\n')
      .replace(/\r/g, '\\r')
      .replace(/\t/g, '\\t')
      .replace(/[\u0000-\u001f]/g, '');
  }
}

/**
 * Reads operation definitions from the top level of the document: a
 * `query`/`mutation`/`subscription` keyword with its optional name, or a bare
 * selection set (an implicit query). Fragment definitions are skipped and
 * any other top-level token is rejected. The first operation found is returned.
 */
export function parseOperationHeader(tokens: GraphQLToken[]): OperationHeader {
  const operations: OperationHeader[] = [];
  let braceDepth = 0;
  let parenDepth = 0;
  let inDefinitionHeader = false;

  tokens.forEach((token, index) => {
    if (braceDepth === 0 && parenDepth === 0 && !inDefinitionHeader && !startsDefinition(token)) {
      throw new QueryValidationError(
        'UnknownOperation',
        'graphql',
        `Invalid GraphQL document structure: unexpected '${token.text}' at top level`,
        { position: token.position }
      );
    }

    if (token.kind === 'punctuator') {
      switch (token.text) {
        case '{':
          if (braceDepth === 0 && parenDepth === 0) {
            if (!inDefinitionHeader) {
              operations.push({ type: 'query', explicit: false });
            }
            inDefinitionHeader = false;
          }
          braceDepth++;
          break;
        case '}':
          braceDepth--;
          break;
        case '(':
          parenDepth++;
          break;
        case ')':
          parenDepth--;
          break;
      }
      return;
    }

    if (token.kind !== 'name' || braceDepth !== 0 || parenDepth !== 0 || inDefinitionHeader) {
      return;
    }

    const word = token.text;
    if (word === 'fragment') {
      inDefinitionHeader = true;
      return;
    }

    if (isOperationType(word)) {
      const next = tokens[index + 1];
      operations.push({
        type: word,
        name: next?.kind === 'name' ? next.text : undefined,
        explicit: true
      });
      inDefinitionHeader = true;
    }
  });

  const subscription = operations.find(operation => operation.type === 'subscription');
  if (subscription) {
    throw new QueryValidationError(
      'UnsupportedOperation',
      'graphql',
      'Subscription operations are not allowed',
      { operation: subscription.name }
    );
  }

  const [first] = operations;
  if (!first) {
    throw new QueryValidationError(
      'UnknownOperation',
      'graphql',
      'GraphQL document does not define a query or mutation operation'
    );
  }
  return first;
}

// Outside a definition header only a selection set, `fragment` or an
// operation keyword may start at the top level. A stray `}` is left to the
// structural check.
function startsDefinition(token: GraphQLToken): boolean {
  if (token.kind === 'punctuator') {
    return token.text === '{' || token.text === '}';
  }
  return token.kind === 'name' && (token.text === 'fragment' || isOperationType(token.text));
}

function isOperationType(word: string): word is OperationType {
  return OPERATION_KEYWORDS.has(word);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function describeType(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}

function tooLarge(path: string, detail: string): QueryValidationError {
  return new QueryValidationError('VariableTooLarge', 'graphql', `Variable '${path}' ${detail}`, { variable: path });
}

let defaultValidator: GraphQLValidator | undefined;

export function validateGraphQLQuery(document: string, variables?: Record<string, unknown>): string {
  defaultValidator ??= new GraphQLValidator();
  return defaultValidator.validateQuery(document, variables);
}
