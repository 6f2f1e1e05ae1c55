import { once } from 'node:events';
import type { Readable } from 'node:stream';
import { getLoggerFor } from 'global-logger-factory';
import { StartFailure } from '../supervisor/errors';
import type { ProcessHandle, UnitConfig, UnitLauncher } from '../supervisor/types';
import { defaultSpawn, killTree, toExitCode, type SpawnFunction } from './process';

export interface ProcessLauncherOptions {
  processFactory?: SpawnFunction;
  /** Environment every unit inherits before its own `environment` is applied. */
  baseEnv?: NodeJS.ProcessEnv;
  /** Directory relative working directories resolve against. */
  cwd?: string;
  killSignal?: NodeJS.Signals;
}

/**
 * Starts units as child processes and forwards their output to the log, one line per entry.
 */
export class ProcessLauncher implements UnitLauncher {
  private readonly logger = getLoggerFor(this);
  private readonly processFactory: SpawnFunction;
  private readonly baseEnv: NodeJS.ProcessEnv;
  private readonly cwd: string;
  private readonly killSignal: NodeJS.Signals;

  public constructor(options: ProcessLauncherOptions = {}) {
    this.processFactory = options.processFactory ?? defaultSpawn;
    this.baseEnv = options.baseEnv ?? process.env;
    this.cwd = options.cwd ?? process.cwd();
    this.killSignal = options.killSignal ?? 'SIGTERM';
  }

  public async start(config: UnitConfig): Promise<ProcessHandle> {
    const [ command, ...args ] = config.start.command;
    if (!command) {
      throw new StartFailure(config.name, new Error('no command configured'));
    }

    this.logger.info(`Launching ${config.name}: ${config.start.command.join(' ')}`);
    const child = this.processFactory(command, args, {
      stdio: [ 'ignore', 'pipe', 'pipe' ],
      env: { ...this.baseEnv, ...config.start.environment },
      cwd: config.start.workingDir ?? this.cwd,
      detached: false,
    });

    const exited = new Promise<number>((resolve) => {
      child.once('exit', (code, signal) => resolve(toExitCode(code, signal)));
    });

    try {
      await once(child, 'spawn');
    } catch (error: unknown) {
      throw new StartFailure(config.name, error);
    }

    child.on('error', (error) => {
      this.logger.error(`${config.name}: ${error.message}`);
    });
    this.pipeOutput(config.name, child.stdout, false);
    this.pipeOutput(config.name, child.stderr, true);

    return {
      pid: child.pid,
      wait: async (): Promise<number> => exited,
      kill: async (): Promise<void> => killTree(child, this.killSignal),
    };
  }

  private pipeOutput(name: string, stream: Readable | null, isError: boolean): void {
    stream?.on('data', (data: Buffer) => {
      for (const line of data.toString().split('\n')) {
        const trimmed = line.trim();
        if (!trimmed) {
          continue;
        }
        if (isError) {
          this.logger.warn(`[${name}] ${trimmed}`);
        } else {
          this.logger.info(`[${name}] ${trimmed}`);
        }
      }
    });
  }
}
