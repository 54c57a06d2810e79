// src/security/jql-validator.ts

import { DEFAULT_JQL_CONFIG } from '../config/defaults.js';
import { JqlAnalysis, JqlConfig } from '../types/index.js';
import { QueryValidationError } from './errors.js';
import { COMPARISON_OPERATORS, JqlToken, tokenizeJql } from './jql-lexer.js';
import { findDangerousPattern, JQL_DANGEROUS_PATTERNS } from './patterns.js';
import { StructuralValidator } from './structural-validator.js';
import { buildJqlWhitelist, JqlWhitelist } from './whitelist.js';

const SQL_KEYWORD = /(?:^|\s)(select|from|where|join|union|insert|update|delete)(?=\s|$)/;
const CUSTOM_FIELD_NAME = /^cf\[(\d+)\]$/i;
// Keywords that can start an operator after a field: in, is [not], was [not] [in], changed
const KEYWORD_OPERATORS: ReadonlySet<string> = new Set(['in', 'is', 'was', 'changed']);

/**
 * Whitelist validator for JQL filters.
 *
 * Every check re-reads the raw query and they always run in the same order,
 * failing on the first violation. A query that passes comes back trimmed and
 * otherwise untouched.
 *
 * @example
 * const validator = new JQLValidator();
 * validator.validateAndSanitize('project = "TEST" AND status = "Open"');
 */
export class JQLValidator {
  private readonly whitelist: JqlWhitelist;
  private readonly structural: StructuralValidator;

  constructor(private readonly config: JqlConfig = DEFAULT_JQL_CONFIG) {
    this.whitelist = buildJqlWhitelist(config.limits, config.extras);
    this.structural = new StructuralValidator({
      language: 'jql',
      delimiters: [['(', ')']],
      maxDepth: config.limits.maxNestingDepth
    });
  }

  validateAndSanitize(jql: string): string {
    return this.analyze(jql).query;
  }

  /**
   * Same checks as {@link validateAndSanitize}, also reporting the fields and
   * functions the query was accepted with.
   */
  analyze(jql: string): JqlAnalysis {
    const { maxLength } = this.config.limits;

    if (!jql || !jql.trim()) {
      throw new QueryValidationError('EmptyInput', 'jql', 'JQL query cannot be empty');
    }
    if (jql.length > maxLength) {
      throw new QueryValidationError('TooLong', 'jql', `JQL query too long (max ${maxLength} characters)`, {
        length: jql.length,
        maxLength
      });
    }

    const dangerous = findDangerousPattern(jql, JQL_DANGEROUS_PATTERNS);
    if (dangerous) {
      throw new QueryValidationError('DangerousPattern', 'jql', `JQL contains a potentially dangerous pattern: ${dangerous.label}`, {
        pattern: dangerous.label
      });
    }

    const depth = this.structural.validate(jql);

    const tokens = tokenizeJql(jql, this.whitelist.keywords);
    const fields = this.validateFields(tokens);
    const functions = this.validateFunctions(tokens);

    const sqlKeyword = SQL_KEYWORD.exec(jql.toLowerCase());
    if (sqlKeyword) {
      throw new QueryValidationError('SqlKeywordNotAllowed', 'jql', `SQL keyword not allowed in JQL: ${sqlKeyword[1]}`, {
        keyword: sqlKeyword[1]
      });
    }

    return { query: jql.trim(), fields, functions, depth };
  }

  private validateFields(tokens: JqlToken[]): string[] {
    const fields: string[] = [];

    for (const field of extractFields(tokens)) {
      if (!this.isAllowedField(field)) {
        throw new QueryValidationError('UnknownField', 'jql', `Unknown or disallowed field: ${field.text}`, {
          field: field.text
        });
      }
      if (!fields.includes(field.text)) {
        fields.push(field.text);
      }
    }

    return fields;
  }

  private validateFunctions(tokens: JqlToken[]): string[] {
    const functions: string[] = [];

    tokens.forEach((token, index) => {
      if (token.kind !== 'identifier' || tokens[index + 1]?.kind !== 'open') {
        return;
      }
      if (!this.whitelist.functions.has(token.text.toLowerCase())) {
        throw new QueryValidationError('UnknownFunction', 'jql', `Unknown or disallowed function: ${token.text}`, {
          function: token.text
        });
      }
      if (!functions.includes(token.text)) {
        functions.push(token.text);
      }
    });

    return functions;
  }

  private isAllowedField(token: JqlToken): boolean {
    if (token.kind === 'customField' && token.customFieldId !== undefined) {
      return this.inCustomFieldRange(token.customFieldId);
    }

    const customField = CUSTOM_FIELD_NAME.exec(token.text);
    if (customField) {
      return this.inCustomFieldRange(Number(customField[1]));
    }

    return this.whitelist.fields.has(token.text.toLowerCase());
  }

  private inCustomFieldRange(id: number): boolean {
    const { min, max } = this.whitelist.customFieldRange;
    return id >= min && id <= max;
  }

  /**
   * Escapes a value for embedding inside a double-quoted JQL string.
   * Control characters are dropped rather than escaped.
   */
  static escapeStringValue(value: string): string {
    return value
      .replace(/\\/g, '\\\\')
      .replace(/"/g, '\\"')
      .replace(/[\u0000-\u001f]/g, '');
  }
}

/**
 * Field references: a name directly followed by a field operator anywhere in
 * the query, plus the sort keys after ORDER BY. Names followed by `(` are
 * function calls and never fields.
 */
export function extractFields(tokens: JqlToken[]): JqlToken[] {
  const fields: JqlToken[] = [];
  let inOrderBy = false;

  tokens.forEach((token, index) => {
    if (isKeyword(token, 'order') && isKeyword(tokens[index + 1], 'by')) {
      inOrderBy = true;
      return;
    }

    const next = tokens[index + 1];

    // A keyword is never a field, so `empty = "x"` has to be reported
    if (token.kind === 'keyword') {
      if (next?.kind === 'operator') {
        fields.push(token);
      }
      return;
    }

    const isName = token.kind === 'identifier' || token.kind === 'customField' || token.kind === 'string';
    if (!isName || (token.kind === 'identifier' && next?.kind === 'open')) {
      return;
    }

    if (inOrderBy || startsFieldOperator(tokens, index + 1)) {
      fields.push(token);
    }
  });

  return fields;
}

function startsFieldOperator(tokens: JqlToken[], index: number): boolean {
  const token = tokens[index];
  if (!token) {
    return false;
  }
  if (token.kind === 'operator') {
    return COMPARISON_OPERATORS.has(token.text);
  }
  if (token.kind !== 'keyword') {
    return false;
  }

  const word = token.text.toLowerCase();
  if (KEYWORD_OPERATORS.has(word)) {
    return true;
  }
  // not in, not changed
  return word === 'not' && (isKeyword(tokens[index + 1], 'in') || isKeyword(tokens[index + 1], 'changed'));
}

function isKeyword(token: JqlToken | undefined, word: string): boolean {
  return token?.kind === 'keyword' && token.text.toLowerCase() === word;
}

let defaultValidator: JQLValidator | undefined;

export function validateJql(jql: string): string {
  defaultValidator ??= new JQLValidator();
  return defaultValidator.validateAndSanitize(jql);
}
