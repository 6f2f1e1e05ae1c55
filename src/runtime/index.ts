export { ProcessLauncher } from './ProcessLauncher';
export type { ProcessLauncherOptions } from './ProcessLauncher';
export { CommandCheckRunner } from './CommandCheckRunner';
export type { CommandCheckRunnerOptions } from './CommandCheckRunner';
export { defaultSpawn, killTree, toExitCode } from './process';
export type { SpawnFunction } from './process';
