/**
 * Proxy Sheets – Winston Logger Setup
 *
 * PURPOSE:
 *   Configures the single timestamped logger used by the manifest compiler, the sheet
 *   generator and the HTTP service. Output always goes to the terminal; when LOG_FILE is
 *   set it is also appended to that file (its directory is created on first use).
 *
 * CONTEXT:
 *   - Used through the logInfo / logWarn / logError helpers in fileHelpers.ts.
 *   - LOG_SILENT=true mutes every transport (the test suite sets it).
 */

import fs from 'fs';
import path from 'path';
import winston from 'winston';

import { getEnv } from './config';

const env = getEnv();

function fileTransports() {
  if (!env.LOG_FILE) return [];
  const logPath = path.resolve(env.LOG_FILE);
  fs.mkdirSync(path.dirname(logPath), { recursive: true });
  return [new winston.transports.File({ filename: logPath })];
}

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  silent: env.LOG_SILENT,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(
      ({ timestamp, level, message }) => `[${timestamp}] ${level.toUpperCase()}: ${message}`
    )
  ),
  transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn'] }), ...fileTransports()],
});
