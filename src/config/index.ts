// src/config/index.ts

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ServerConfig } from '../types/index.js';
import { DEFAULT_GRAPHQL_CONFIG, DEFAULT_JQL_CONFIG } from './defaults.js';

dotenvConfig();

type Env = Record<string, string | undefined>;

// Comma-separated identifier lists, e.g. JQL_EXTRA_FIELDS="storyPoints,team"
const csvList = z
  .string()
  .optional()
  .transform(value => (value ? value.split(',').map(item => item.trim()).filter(Boolean) : []))
  .pipe(z.array(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be an identifier')));

const limit = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const flag = z
  .enum(['true', 'false'])
  .optional()
  .transform(value => value === 'true');

const EnvSchema = z
  .object({
    JQL_MAX_LENGTH: limit(DEFAULT_JQL_CONFIG.limits.maxLength),
    JQL_MAX_NESTING_DEPTH: limit(DEFAULT_JQL_CONFIG.limits.maxNestingDepth),
    JQL_CUSTOM_FIELD_MIN: limit(DEFAULT_JQL_CONFIG.limits.customFieldMin),
    JQL_CUSTOM_FIELD_MAX: limit(DEFAULT_JQL_CONFIG.limits.customFieldMax),
    JQL_EXTRA_FIELDS: csvList,
    JQL_EXTRA_FUNCTIONS: csvList,
    GRAPHQL_MAX_LENGTH: limit(DEFAULT_GRAPHQL_CONFIG.limits.maxLength),
    GRAPHQL_MAX_DEPTH: limit(DEFAULT_GRAPHQL_CONFIG.limits.maxDepth),
    GRAPHQL_MAX_VARIABLES: limit(DEFAULT_GRAPHQL_CONFIG.limits.maxVariables),
    GRAPHQL_MAX_STRING_LENGTH: limit(DEFAULT_GRAPHQL_CONFIG.limits.maxStringLength),
    GRAPHQL_MAX_LIST_LENGTH: limit(DEFAULT_GRAPHQL_CONFIG.limits.maxListLength),
    GRAPHQL_MAX_OBJECT_KEYS: limit(DEFAULT_GRAPHQL_CONFIG.limits.maxObjectKeys),
    GRAPHQL_EXTRA_FIELDS: csvList,
    GRAPHQL_EXTRA_QUERIES: csvList,
    GRAPHQL_EXTRA_MUTATIONS: csvList,
    ENABLE_AUDIT_LOG: flag,
    AUDIT_LOG_PATH: z.string().min(1).default('./logs')
  })
  .refine(env => env.JQL_CUSTOM_FIELD_MIN <= env.JQL_CUSTOM_FIELD_MAX, {
    message: 'JQL_CUSTOM_FIELD_MIN must not exceed JQL_CUSTOM_FIELD_MAX',
    path: ['JQL_CUSTOM_FIELD_MIN']
  });

export function loadConfig(env: Env = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n${problems.join('\n')}`);
  }

  const vars = parsed.data;
  return {
    jql: {
      limits: {
        maxLength: vars.JQL_MAX_LENGTH,
        maxNestingDepth: vars.JQL_MAX_NESTING_DEPTH,
        customFieldMin: vars.JQL_CUSTOM_FIELD_MIN,
        customFieldMax: vars.JQL_CUSTOM_FIELD_MAX
      },
      extras: {
        fields: vars.JQL_EXTRA_FIELDS,
        functions: vars.JQL_EXTRA_FUNCTIONS
      }
    },
    graphql: {
      limits: {
        maxLength: vars.GRAPHQL_MAX_LENGTH,
        maxDepth: vars.GRAPHQL_MAX_DEPTH,
        maxVariables: vars.GRAPHQL_MAX_VARIABLES,
        maxStringLength: vars.GRAPHQL_MAX_STRING_LENGTH,
        maxListLength: vars.GRAPHQL_MAX_LIST_LENGTH,
        maxObjectKeys: vars.GRAPHQL_MAX_OBJECT_KEYS
      },
      extras: {
        fields: vars.GRAPHQL_EXTRA_FIELDS,
        queries: vars.GRAPHQL_EXTRA_QUERIES,
        mutations: vars.GRAPHQL_EXTRA_MUTATIONS
      }
    },
    audit: {
      enabled: vars.ENABLE_AUDIT_LOG,
      logPath: vars.AUDIT_LOG_PATH
    }
  };
}
