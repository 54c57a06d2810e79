// src/security/patterns.ts

export interface DangerousPattern {
  label: string;
  pattern: RegExp;
}

// No `g` flag on any of these: they are reused across calls with .test().
export const JQL_DANGEROUS_PATTERNS: readonly DangerousPattern[] = Object.freeze([
  { label: 'SQL line comment', pattern: /;\s*--/i },
  { label: 'SQL block comment', pattern: /;\s*\/\*/i },
  { label: 'SQL keyword', pattern: /\b(?:union|select|drop|delete|insert|update|exec)\b/i },
  { label: 'script marker', pattern: /\bscript\b/i },
  { label: 'HTML/XML tag', pattern: /<[^>]+>/ },
  { label: 'template interpolation', pattern: /\$\{/ },
  { label: 'hex escape', pattern: /\\x[0-9a-f]{2}/i }
]);

export const GRAPHQL_DANGEROUS_PATTERNS: readonly DangerousPattern[] = Object.freeze([
  { label: 'schema introspection', pattern: /__schema/i },
  // __typename stays allowed for client-side caching
  { label: 'type introspection', pattern: /__type(?!name)/i },
  { label: 'script tag', pattern: /<script[^>]*>/i },
  { label: 'javascript URL', pattern: /javascript:/i },
  { label: 'data URL', pattern: /\bdata:(?:[a-z]+\/[a-z0-9.+-]+|;[^,\s]*,|,)/i },
  { label: 'eval call', pattern: /\beval\s*\(/i },
  { label: 'function literal', pattern: /\bfunction\s*\(/i },
  { label: 'template interpolation', pattern: /\$\{/ },
  { label: 'HTML comment start', pattern: /<!--/ },
  { label: 'HTML comment end', pattern: /--!>/ }
]);

export function findDangerousPattern(
  text: string,
  patterns: readonly DangerousPattern[]
): DangerousPattern | undefined {
  return patterns.find(({ pattern }) => pattern.test(text));
}
