// src/types/index.ts

export type QueryLanguage = 'jql' | 'graphql';

export interface JqlLimits {
  maxLength: number;
  maxNestingDepth: number;
  customFieldMin: number;
  customFieldMax: number;
}

export interface GraphQLLimits {
  maxLength: number;
  maxDepth: number;
  maxVariables: number;
  maxStringLength: number;
  maxListLength: number;
  maxObjectKeys: number;
}

// Operator-supplied additions; the bundled tables are never shrunk.
export interface JqlWhitelistExtras {
  fields: string[];
  functions: string[];
}

export interface GraphQLWhitelistExtras {
  fields: string[];
  queries: string[];
  mutations: string[];
}

export interface JqlConfig {
  limits: JqlLimits;
  extras: JqlWhitelistExtras;
}

export interface GraphQLConfig {
  limits: GraphQLLimits;
  extras: GraphQLWhitelistExtras;
}

export interface ServerConfig {
  jql: JqlConfig;
  graphql: GraphQLConfig;
  audit: {
    enabled: boolean;
    logPath: string;
  };
}

/**
 * A caller-supplied GraphQL variable value as it arrives from JSON.
 * The validator accepts `unknown` and narrows into this shape while walking.
 */
export type VariableValue =
  | null
  | string
  | number
  | boolean
  | VariableValue[]
  | { [key: string]: VariableValue };

export type OperationType = 'query' | 'mutation' | 'subscription';

export interface OperationHeader {
  type: OperationType;
  name?: string;
  // false for an anonymous `{ ... }` document
  explicit: boolean;
}

export interface JqlAnalysis {
  query: string;
  fields: string[];
  functions: string[];
  depth: number;
}

export interface AuditEntry {
  timestamp: Date;
  operation: string;
  language: QueryLanguage;
  success: boolean;
  queryLength: number;
  query: string;
  rejection?: {
    kind: string;
    message: string;
  };
}
