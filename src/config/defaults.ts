// src/config/defaults.ts

import { GraphQLConfig, JqlConfig } from '../types/index.js';

export const DEFAULT_JQL_CONFIG: JqlConfig = {
  limits: {
    maxLength: 1000,
    maxNestingDepth: 3,
    // Jira allocates custom field ids from 10000 upwards
    customFieldMin: 10000,
    customFieldMax: 99999
  },
  extras: {
    fields: [],
    functions: []
  }
};

export const DEFAULT_GRAPHQL_CONFIG: GraphQLConfig = {
  limits: {
    maxLength: 5000,
    maxDepth: 10,
    maxVariables: 50,
    maxStringLength: 1000,
    maxListLength: 100,
    maxObjectKeys: 50
  },
  extras: {
    fields: [],
    queries: [],
    mutations: []
  }
};
