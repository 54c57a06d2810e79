// src/security/graphql-lexer.ts

export type GraphQLTokenKind = 'name' | 'variable' | 'string' | 'number' | 'punctuator' | 'other';

export interface GraphQLToken {
  kind: GraphQLTokenKind;
  text: string;
  position: number;
  // Only meaningful for strings
  terminated?: boolean;
}

const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_]/;
const NUMBER_PART = /[0-9.eE+-]/;
const PUNCTUATORS = new Set(['{', '}', '(', ')', '[', ']', ':', '=', '@', '!', ',', '|', '&', '$']);

/**
 * Splits a GraphQL document into names, variables, literals and punctuation.
 * `#` comments and insignificant whitespace are dropped; string contents are
 * kept as one token so they can never be read as field names.
 */
export function tokenizeGraphQL(document: string): GraphQLToken[] {
  const tokens: GraphQLToken[] = [];
  let i = 0;

  while (i < document.length) {
    const char = document[i];

    if (/\s/.test(char) || char === '\uFEFF') {
      i++;
      continue;
    }

    if (char === '#') {
      while (i < document.length && document[i] !== '\n' && document[i] !== '\r') {
        i++;
      }
      continue;
    }

    if (char === '"') {
      const start = i;
      const block = document.startsWith('"""', i);
      const end = block ? findBlockStringEnd(document, i + 3) : findStringEnd(document, i + 1);
      const terminated = end !== -1;
      const stop = terminated ? end : document.length;
      tokens.push({ kind: 'string', text: document.slice(start, stop), position: start, terminated });
      i = stop;
      continue;
    }

    if (document.startsWith('...', i)) {
      tokens.push({ kind: 'punctuator', text: '...', position: i });
      i += 3;
      continue;
    }

    if (char === '$' && NAME_START.test(document[i + 1] ?? '')) {
      const start = i;
      i++;
      while (i < document.length && NAME_PART.test(document[i])) {
        i++;
      }
      tokens.push({ kind: 'variable', text: document.slice(start, i), position: start });
      continue;
    }

    if (NAME_START.test(char)) {
      const start = i;
      while (i < document.length && NAME_PART.test(document[i])) {
        i++;
      }
      tokens.push({ kind: 'name', text: document.slice(start, i), position: start });
      continue;
    }

    if (/[0-9]/.test(char) || (char === '-' && /[0-9]/.test(document[i + 1] ?? ''))) {
      const start = i;
      i++;
      while (i < document.length && NUMBER_PART.test(document[i])) {
        i++;
      }
      tokens.push({ kind: 'number', text: document.slice(start, i), position: start });
      continue;
    }

    tokens.push({ kind: PUNCTUATORS.has(char) ? 'punctuator' : 'other', text: char, position: i });
    i++;
  }

  return tokens;
}

// Index just past the closing quote, or -1.
function findStringEnd(document: string, from: number): number {
  for (let i = from; i < document.length; i++) {
    const char = document[i];
    if (char === '\\') {
      i++;
    } else if (char === '"') {
      return i + 1;
    } else if (char === '\n' || char === '\r') {
      return -1;
    }
  }
  return -1;
}

function findBlockStringEnd(document: string, from: number): number {
  for (let i = from; i < document.length; i++) {
    if (document.startsWith('\\"""', i)) {
      i += 3;
    } else if (document.startsWith('"""', i)) {
      return i + 3;
    }
  }
  return -1;
}
