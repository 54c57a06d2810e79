// src/security/jql-lexer.ts

import { QueryValidationError } from './errors.js';

export type JqlTokenKind =
  | 'identifier'
  | 'customField'
  | 'string'
  | 'number'
  | 'operator'
  | 'logical'
  | 'keyword'
  | 'open'
  | 'close'
  | 'comma';

export interface JqlToken {
  kind: JqlTokenKind;
  // Source text; for strings this is the unquoted, unescaped content.
  text: string;
  position: number;
  // cf[N] id for customField tokens
  customFieldId?: number;
}

export const COMPARISON_OPERATORS: ReadonlySet<string> = new Set(['=', '!=', '>', '>=', '<', '<=', '~', '!~']);

const IDENTIFIER_START = /[A-Za-z]/;
const IDENTIFIER_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;
const CUSTOM_FIELD = /cf\[(\d+)\]/iy;
const DURATION_UNIT = /(?:minutes?|hours?|days?|weeks?|months?|years?|[yMwdhm])(?![A-Za-z0-9_])/y;
const LOGICAL = /&&|\|\||[&|!]/y;

/**
 * Flat tokenizer for JQL. It does not understand the grammar; it only makes
 * sure literal values can never be mistaken for identifiers.
 *
 * @param keywords lower-cased words that lex as `keyword` instead of `identifier`
 */
export function tokenizeJql(jql: string, keywords: ReadonlySet<string>): JqlToken[] {
  const tokens: JqlToken[] = [];
  let i = 0;

  while (i < jql.length) {
    const char = jql[i];

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    if (char === '"' || char === "'") {
      const start = i;
      let value = '';
      i++;
      while (i < jql.length && jql[i] !== char) {
        if (jql[i] === '\\' && i + 1 < jql.length) {
          i++;
        }
        value += jql[i];
        i++;
      }
      if (i >= jql.length) {
        throw new QueryValidationError('UnbalancedQuotes', 'jql', 'Unterminated string literal in JQL query', {
          position: start
        });
      }
      i++;
      tokens.push({ kind: 'string', text: value, position: start });
      continue;
    }

    CUSTOM_FIELD.lastIndex = i;
    const customField = CUSTOM_FIELD.exec(jql);
    if (customField) {
      tokens.push({
        kind: 'customField',
        text: customField[0],
        position: i,
        customFieldId: Number(customField[1])
      });
      i += customField[0].length;
      continue;
    }

    if (IDENTIFIER_START.test(char)) {
      const start = i;
      while (i < jql.length && IDENTIFIER_PART.test(jql[i])) {
        i++;
      }
      const text = jql.slice(start, i);
      tokens.push({ kind: keywords.has(text.toLowerCase()) ? 'keyword' : 'identifier', text, position: start });
      continue;
    }

    if (DIGIT.test(char) || (char === '-' && DIGIT.test(jql[i + 1] ?? ''))) {
      // Numbers carry an optional duration suffix: 7d, -2w, 1.5h
      const start = i;
      i++;
      while (i < jql.length && /[0-9.]/.test(jql[i])) {
        i++;
      }
      DURATION_UNIT.lastIndex = i;
      const unit = DURATION_UNIT.exec(jql);
      if (unit) {
        i += unit[0].length;
      }
      tokens.push({ kind: 'number', text: jql.slice(start, i), position: start });
      continue;
    }

    const twoChars = jql.slice(i, i + 2);
    if (COMPARISON_OPERATORS.has(twoChars)) {
      tokens.push({ kind: 'operator', text: twoChars, position: i });
      i += 2;
      continue;
    }
    if (COMPARISON_OPERATORS.has(char)) {
      tokens.push({ kind: 'operator', text: char, position: i });
      i++;
      continue;
    }

    LOGICAL.lastIndex = i;
    const logical = LOGICAL.exec(jql);
    if (logical) {
      tokens.push({ kind: 'logical', text: logical[0], position: i });
      i += logical[0].length;
      continue;
    }

    if (char === '(' || char === ')' || char === ',') {
      tokens.push({ kind: char === '(' ? 'open' : char === ')' ? 'close' : 'comma', text: char, position: i });
      i++;
      continue;
    }

    // Jira reserved characters ([ ] . ; @ * / % ...) are only valid inside quotes
    throw new QueryValidationError('UnknownField', 'jql', `Unexpected character in JQL query: ${char}`, {
      character: char,
      position: i
    });
  }

  return tokens;
}
