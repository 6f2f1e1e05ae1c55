import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { constants } from 'node:os';
import kill from 'tree-kill';

export type SpawnFunction = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export const defaultSpawn: SpawnFunction = (command, args, options) => spawn(command, args, options);

/**
 * Maps a child's exit to a shell-style exit code: signal deaths become 128 + signal number.
 */
export function toExitCode(code: number | null, signal: NodeJS.Signals | null): number {
  if (typeof code === 'number') {
    return code;
  }
  if (signal) {
    const entry = Object.entries(constants.signals).find(([ name ]) => name === signal);
    return 128 + (entry?.[1] ?? 0);
  }
  return 1;
}

/**
 * Kills the child together with everything it spawned.
 */
export function killTree(child: ChildProcess, signal: NodeJS.Signals = 'SIGTERM'): Promise<void> {
  return new Promise((resolve, reject) => {
    if (child.pid === undefined) {
      child.kill(signal);
      resolve();
      return;
    }
    kill(child.pid, signal, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
