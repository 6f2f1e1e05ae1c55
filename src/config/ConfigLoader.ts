import fs from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { DependencyGraph } from '../supervisor/DependencyGraph';
import { ConfigError } from '../supervisor/errors';
import type { CheckCommand, HealthCheckSpec, RestartPolicy, UnitConfig } from '../supervisor/types';
import { parseDuration } from './duration';

const DEFAULT_INTERVAL_MS = 30_000;
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_RETRIES = 3;
const DEFAULT_START_PERIOD_MS = 0;

const SERVICE_NAME = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/u;
const CONDITIONS = new Set([ 'service_healthy', 'service_started' ]);

export interface ParseOptions {
  /** Directory relative `working_dir` entries resolve against. */
  baseDir?: string;
  /** Environment consulted for `environment` entries given without a value. */
  env?: NodeJS.ProcessEnv;
}

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Reads a compose-style stack file (YAML or JSON) and returns its units.
 */
export async function loadStackFile(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<UnitConfig[]> {
  const resolved = path.resolve(filePath);
  let content: string;
  try {
    content = await fs.readFile(resolved, 'utf-8');
  } catch (error: unknown) {
    throw new ConfigError(`cannot read stack file: ${error instanceof Error ? error.message : String(error)}`, filePath);
  }

  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (error: unknown) {
    throw new ConfigError(`invalid YAML: ${error instanceof Error ? error.message : String(error)}`, filePath);
  }

  try {
    return parseStack(document, { baseDir: path.dirname(resolved), env });
  } catch (error: unknown) {
    if (error instanceof ConfigError && !error.path) {
      throw new ConfigError(error.message, filePath);
    }
    throw error;
  }
}

/**
 * Loads a stack file and validates its dependency graph.
 */
export async function loadStackGraph(filePath: string, env?: NodeJS.ProcessEnv): Promise<DependencyGraph> {
  return DependencyGraph.fromUnits(await loadStackFile(filePath, env));
}

export function parseStack(document: unknown, options: ParseOptions = {}): UnitConfig[] {
  if (!isRecord(document) || !isRecord(document.services)) {
    throw new ConfigError('expected a top-level "services" mapping');
  }
  const units: UnitConfig[] = [];
  for (const [ name, service ] of Object.entries(document.services)) {
    if (!SERVICE_NAME.test(name)) {
      throw new ConfigError(`invalid service name "${name}"`);
    }
    if (!isRecord(service)) {
      throw new ConfigError(`services.${name} must be a mapping`);
    }
    units.push(parseService(name, service, options));
  }
  if (units.length === 0) {
    throw new ConfigError('no services declared');
  }
  return units;
}

function parseService(name: string, service: Fields, options: ParseOptions): UnitConfig {
  const where = `services.${name}`;
  const healthcheck = parseHealthcheck(where, service.healthcheck);
  return {
    name,
    start: {
      command: parseCommand(where, service.command),
      environment: parseEnvironment(where, service.environment, options.env ?? process.env),
      workingDir: parseWorkingDir(where, service.working_dir, options.baseDir),
    },
    dependsOn: parseDependsOn(where, service.depends_on),
    restart: parseRestart(where, service.restart),
    ...(healthcheck ? { healthcheck } : {}),
  };
}

function parseCommand(where: string, value: unknown): string[] {
  if (typeof value === 'string' && value.trim().length > 0) {
    return [ '/bin/sh', '-c', value ];
  }
  if (isStringArray(value) && value.length > 0) {
    return value;
  }
  throw new ConfigError(`${where}.command must be a non-empty string or list of strings`);
}

function parseEnvironment(where: string, value: unknown, env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  if (value === undefined || value === null) {
    return result;
  }
  if (isStringArray(value)) {
    for (const entry of value) {
      const eqIndex = entry.indexOf('=');
      if (eqIndex === -1) {
        const inherited = env[entry];
        if (inherited !== undefined) {
          result[entry] = inherited;
        }
        continue;
      }
      result[entry.slice(0, eqIndex)] = entry.slice(eqIndex + 1);
    }
    return result;
  }
  if (isRecord(value)) {
    for (const [ key, raw ] of Object.entries(value)) {
      if (raw === null || raw === undefined) {
        const inherited = env[key];
        if (inherited !== undefined) {
          result[key] = inherited;
        }
      } else if (typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'boolean') {
        result[key] = String(raw);
      } else {
        throw new ConfigError(`${where}.environment.${key} must be a scalar`);
      }
    }
    return result;
  }
  throw new ConfigError(`${where}.environment must be a mapping or a list of KEY=value entries`);
}

function parseWorkingDir(where: string, value: unknown, baseDir?: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${where}.working_dir must be a path`);
  }
  return baseDir ? path.resolve(baseDir, value) : value;
}

function parseDependsOn(where: string, value: unknown): string[] {
  if (value === undefined) {
    return [];
  }
  if (isStringArray(value)) {
    return [ ...new Set(value) ];
  }
  if (isRecord(value)) {
    for (const [ prerequisite, spec ] of Object.entries(value)) {
      if (spec === null) {
        continue;
      }
      if (!isRecord(spec)) {
        throw new ConfigError(`${where}.depends_on.${prerequisite} must be a mapping`);
      }
      if (spec.condition !== undefined && (typeof spec.condition !== 'string' || !CONDITIONS.has(spec.condition))) {
        throw new ConfigError(`${where}.depends_on.${prerequisite}.condition must be one of ${[ ...CONDITIONS ].join(', ')}`);
      }
    }
    return Object.keys(value);
  }
  throw new ConfigError(`${where}.depends_on must be a list or a mapping`);
}

function parseRestart(where: string, value: unknown): RestartPolicy {
  if (value === undefined || value === 'no' || value === false) {
    return 'never';
  }
  if (value === 'always' || value === 'unless-stopped') {
    return 'always';
  }
  if (typeof value === 'string' && /^on-failure(?::\d+)?$/u.test(value)) {
    return 'on-failure';
  }
  throw new ConfigError(`${where}.restart must be one of no, on-failure, always, unless-stopped`);
}

function parseHealthcheck(where: string, value: unknown): HealthCheckSpec | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigError(`${where}.healthcheck must be a mapping`);
  }
  if (value.disable === true) {
    return undefined;
  }
  const test = parseTest(`${where}.healthcheck.test`, value.test);
  if (!test) {
    return undefined;
  }

  const intervalMs = parseDurationField(`${where}.healthcheck.interval`, value.interval, DEFAULT_INTERVAL_MS);
  const timeoutMs = parseDurationField(`${where}.healthcheck.timeout`, value.timeout, DEFAULT_TIMEOUT_MS);
  const startPeriodMs = parseDurationField(`${where}.healthcheck.start_period`, value.start_period, DEFAULT_START_PERIOD_MS);
  if (intervalMs <= 0) {
    throw new ConfigError(`${where}.healthcheck.interval must be greater than zero`);
  }
  if (timeoutMs <= 0) {
    throw new ConfigError(`${where}.healthcheck.timeout must be greater than zero`);
  }

  let retries = DEFAULT_RETRIES;
  if (value.retries !== undefined) {
    if (typeof value.retries !== 'number' || !Number.isInteger(value.retries) || value.retries < 1) {
      throw new ConfigError(`${where}.healthcheck.retries must be a positive integer`);
    }
    retries = value.retries;
  }

  return { test, intervalMs, timeoutMs, retries, startPeriodMs };
}

/**
 * `undefined` means the check is switched off (`["NONE"]`).
 */
function parseTest(where: string, value: unknown): CheckCommand | undefined {
  if (typeof value === 'string' && value.trim().length > 0) {
    return { type: 'shell', script: value };
  }
  if (isStringArray(value) && value.length > 0) {
    const [ kind, ...rest ] = value;
    if (kind === 'NONE') {
      return undefined;
    }
    if (kind === 'CMD' && rest.length > 0) {
      return { type: 'exec', argv: rest };
    }
    if (kind === 'CMD-SHELL' && rest.length > 0) {
      return { type: 'shell', script: rest.join(' ') };
    }
  }
  throw new ConfigError(`${where} must be a command string or a list starting with CMD, CMD-SHELL or NONE`);
}

function parseDurationField(where: string, value: unknown, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = typeof value === 'string' ? parseDuration(value) : undefined;
  if (parsed === undefined) {
    throw new ConfigError(`${where} must be a duration such as 10s or 1m30s`);
  }
  return parsed;
}
