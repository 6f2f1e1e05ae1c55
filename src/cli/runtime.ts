import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { setGlobalLoggerFactory } from 'global-logger-factory';
import { ConfigurableLoggerFactory } from '../logging/ConfigurableLoggerFactory';

export const EXIT_CONFIG_ERROR = 20;
export const EXIT_BLOCKED = 30;
export const EXIT_INTERNAL_ERROR = 50;

export const DEFAULT_STACK_FILE = 'healthgate.yml';

export interface LoggingArgs {
  logLevel: string;
  logFile?: string;
}

export function initLogger(args: LoggingArgs): void {
  setGlobalLoggerFactory(new ConfigurableLoggerFactory(args.logLevel, {
    fileName: args.logFile,
    colorize: process.stderr.isTTY,
  }));
}

/**
 * Loads KEY=value pairs into `process.env` without overriding what is already set.
 */
export function loadEnvFile(envPath: string): void {
  const resolved = path.resolve(envPath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Env file not found: ${resolved}`);
  }
  const result = dotenv.config({ path: resolved });
  if (result.error) {
    throw result.error;
  }
}

export function resolveStackFile(file?: string): string {
  return file ?? process.env.HEALTHGATE_FILE ?? DEFAULT_STACK_FILE;
}
