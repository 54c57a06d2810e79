// src/security/structural-validator.ts

import { QueryLanguage } from '../types/index.js';
import { QueryValidationError } from './errors.js';

export interface StructuralOptions {
  language: QueryLanguage;
  // Open/close character pairs that count towards balance and depth.
  delimiters: ReadonlyArray<readonly [string, string]>;
  maxDepth: number;
  // Treat """...""" as one literal (GraphQL block strings)
  blockStrings?: boolean;
  // Character starting a comment that runs to the end of the line
  lineComment?: string;
}

/**
 * Checks quote balance, delimiter balance and nesting depth in one pass.
 *
 * Only the maximum depth matters once balance holds, so a running counter
 * replaces a stack of positions. Delimiters and backslash-escaped quotes
 * inside double-quoted literals are ignored, as is anything inside a line
 * comment when the language has one. Returns the maximum depth seen.
 */
export class StructuralValidator {
  private readonly opens: Map<string, number>;
  private readonly closes: Map<string, number>;

  constructor(private readonly options: StructuralOptions) {
    this.opens = new Map(options.delimiters.map(([open], index) => [open, index]));
    this.closes = new Map(options.delimiters.map(([, close], index) => [close, index]));
  }

  validate(text: string): number {
    const { language, delimiters, maxDepth } = this.options;
    const balance = new Array<number>(delimiters.length).fill(0);
    let inString = false;
    let inBlockString = false;
    let depth = 0;
    let deepest = 0;
    let closedBeforeOpen = false;

    for (let i = 0; i < text.length; i++) {
      const char = text[i];

      if (inBlockString) {
        if (text.startsWith('\\"""', i)) {
          i += 3;
        } else if (text.startsWith('"""', i)) {
          inBlockString = false;
          i += 2;
        }
        continue;
      }

      if (inString) {
        if (char === '\\') {
          i++;
        } else if (char === '"') {
          inString = false;
        }
        continue;
      }

      if (char === this.options.lineComment) {
        while (i + 1 < text.length && text[i + 1] !== '\n' && text[i + 1] !== '\r') {
          i++;
        }
        continue;
      }

      if (this.options.blockStrings && text.startsWith('"""', i)) {
        inBlockString = true;
        i += 2;
        continue;
      }

      if (char === '"') {
        inString = true;
        continue;
      }

      const openIndex = this.opens.get(char);
      if (openIndex !== undefined) {
        balance[openIndex]++;
        depth++;
        deepest = Math.max(deepest, depth);
        continue;
      }

      const closeIndex = this.closes.get(char);
      if (closeIndex !== undefined) {
        balance[closeIndex]--;
        depth--;
        if (balance[closeIndex] < 0) {
          closedBeforeOpen = true;
        }
      }
    }

    if (inString || inBlockString) {
      throw new QueryValidationError('UnbalancedQuotes', language, `Unbalanced quotes in ${label(language)} query`);
    }

    const unbalanced = balance.findIndex(count => count !== 0);
    if (closedBeforeOpen || unbalanced !== -1) {
      const pair = delimiters[unbalanced === -1 ? 0 : unbalanced];
      throw new QueryValidationError(
        'UnbalancedDelimiters',
        language,
        `Unbalanced '${pair[0]}${pair[1]}' delimiters in ${label(language)} query`
      );
    }

    if (deepest > maxDepth) {
      throw new QueryValidationError(
        'NestingTooDeep',
        language,
        `${label(language)} nesting too deep (max ${maxDepth} levels)`,
        { depth: deepest, maxDepth }
      );
    }

    return deepest;
  }
}

export function label(language: QueryLanguage): string {
  return language === 'jql' ? 'JQL' : 'GraphQL';
}
