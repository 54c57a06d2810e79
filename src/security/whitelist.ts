// src/security/whitelist.ts

import { readFileSync } from 'fs';
import { z } from 'zod';
import { GraphQLWhitelistExtras, JqlLimits, JqlWhitelistExtras } from '../types/index.js';

const identifierList = z.array(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/)).nonempty();

const JqlWhitelistFileSchema = z.object({
  fields: identifierList,
  functions: identifierList,
  keywords: identifierList
});

const GraphQLWhitelistFileSchema = z.object({
  fields: identifierList,
  queries: identifierList,
  mutations: identifierList,
  keywords: identifierList,
  directives: identifierList,
  suspiciousSubstrings: z.array(z.string().min(1))
});

export type JqlWhitelistFile = z.infer<typeof JqlWhitelistFileSchema>;
export type GraphQLWhitelistFile = z.infer<typeof GraphQLWhitelistFileSchema>;

// Resolved beside the module so the same relative path works from src/ and dist/.
const DATA_DIR = new URL('../../data/', import.meta.url);

function readWhitelistFile<T>(fileName: string, schema: z.ZodType<T>): T {
  const raw: unknown = JSON.parse(readFileSync(new URL(fileName, DATA_DIR), 'utf8'));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid whitelist file ${fileName}: ${parsed.error.message}`);
  }
  return parsed.data;
}

let jqlFile: JqlWhitelistFile | undefined;
let graphqlFile: GraphQLWhitelistFile | undefined;

export function loadJqlWhitelistFile(): JqlWhitelistFile {
  jqlFile ??= readWhitelistFile('jql-whitelist.json', JqlWhitelistFileSchema);
  return jqlFile;
}

export function loadGraphQLWhitelistFile(): GraphQLWhitelistFile {
  graphqlFile ??= readWhitelistFile('graphql-whitelist.json', GraphQLWhitelistFileSchema);
  return graphqlFile;
}

function readonlySet(values: Iterable<string>, normalize: (value: string) => string = v => v): ReadonlySet<string> {
  const set = new Set<string>();
  for (const value of values) {
    set.add(normalize(value));
  }
  return set;
}

const lower = (value: string) => value.toLowerCase();

/**
 * JQL identifiers compare case-insensitively, so every set holds lower-cased entries.
 */
export interface JqlWhitelist {
  readonly fields: ReadonlySet<string>;
  readonly functions: ReadonlySet<string>;
  readonly keywords: ReadonlySet<string>;
  readonly customFieldRange: { readonly min: number; readonly max: number };
}

export interface GraphQLWhitelist {
  readonly fields: ReadonlySet<string>;
  readonly queries: ReadonlySet<string>;
  readonly mutations: ReadonlySet<string>;
  readonly keywords: ReadonlySet<string>;
  readonly directives: ReadonlySet<string>;
  readonly suspiciousSubstrings: readonly string[];
}

export function buildJqlWhitelist(
  limits: Pick<JqlLimits, 'customFieldMin' | 'customFieldMax'>,
  extras: JqlWhitelistExtras = { fields: [], functions: [] },
  file: JqlWhitelistFile = loadJqlWhitelistFile()
): JqlWhitelist {
  return Object.freeze({
    fields: readonlySet([...file.fields, ...extras.fields], lower),
    functions: readonlySet([...file.functions, ...extras.functions], lower),
    keywords: readonlySet(file.keywords, lower),
    customFieldRange: Object.freeze({ min: limits.customFieldMin, max: limits.customFieldMax })
  });
}

export function buildGraphQLWhitelist(
  extras: GraphQLWhitelistExtras = { fields: [], queries: [], mutations: [] },
  file: GraphQLWhitelistFile = loadGraphQLWhitelistFile()
): GraphQLWhitelist {
  return Object.freeze({
    fields: readonlySet([...file.fields, ...extras.fields]),
    queries: readonlySet([...file.queries, ...extras.queries]),
    mutations: readonlySet([...file.mutations, ...extras.mutations]),
    keywords: readonlySet(file.keywords),
    directives: readonlySet(file.directives),
    suspiciousSubstrings: Object.freeze(file.suspiciousSubstrings.map(lower))
  });
}
