// src/config/logger.ts

import { config as dotenvConfig } from 'dotenv';
import winston from 'winston';

// Loaded here as well: modules that log are imported before the config module.
dotenvConfig({ path: process.env.DOTENV_CONFIG_PATH });

const logLevel = process.env.LOG_LEVEL || 'info';

// In MCP (stdio) transports, stdout must be reserved strictly for JSON-RPC.
// Every level goes to stderr so the JSON stream read from stdout stays intact.
const allLevels = Object.keys(winston.config.npm.levels);

export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'query-firewall-mcp' },
  transports: [
    new winston.transports.Console({
      stderrLevels: allLevels,
      // Plain output, no ANSI color codes
      format: winston.format.combine(
        winston.format.simple()
      )
    })
  ]
});

// Add file transport if log file is specified
if (process.env.LOG_FILE) {
  logger.add(new winston.transports.File({
    filename: process.env.LOG_FILE,
    format: winston.format.json()
  }));
}
