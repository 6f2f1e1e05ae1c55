export * from './supervisor';
export { CommandCheckRunner, ProcessLauncher, killTree, toExitCode } from './runtime';
export type { CommandCheckRunnerOptions, ProcessLauncherOptions, SpawnFunction } from './runtime';
export { loadStackFile, loadStackGraph, parseStack } from './config/ConfigLoader';
export type { ParseOptions } from './config/ConfigLoader';
export { formatDuration, parseDuration } from './config/duration';
export { ConfigurableLoggerFactory } from './logging/ConfigurableLoggerFactory';
export type { ConfigurableLoggerOptions } from './logging/ConfigurableLoggerFactory';
