import { getLoggerFor } from 'global-logger-factory';
import type { CheckCommand, CheckOutcome, CheckRunner } from '../supervisor/types';
import { defaultSpawn, killTree, toExitCode, type SpawnFunction } from './process';

export interface CommandCheckRunnerOptions {
  processFactory?: SpawnFunction;
  shell?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs health check commands as short-lived processes. Aborting the signal kills the check.
 */
export class CommandCheckRunner implements CheckRunner {
  private readonly logger = getLoggerFor(this);
  private readonly processFactory: SpawnFunction;
  private readonly shell: string;
  private readonly env: NodeJS.ProcessEnv;

  public constructor(options: CommandCheckRunnerOptions = {}) {
    this.processFactory = options.processFactory ?? defaultSpawn;
    this.shell = options.shell ?? '/bin/sh';
    this.env = options.env ?? process.env;
  }

  public async runCheck(command: CheckCommand, signal: AbortSignal): Promise<CheckOutcome> {
    if (signal.aborted) {
      throw new Error('Health check aborted before it started');
    }
    const [ file, args ]: [ string | undefined, string[] ] = command.type === 'shell' ?
      [ this.shell, [ '-c', command.script ] ] :
      [ command.argv[0], command.argv.slice(1) ];
    if (!file) {
      throw new Error('Health check has no command');
    }

    const started = Date.now();
    const child = this.processFactory(file, args, { stdio: 'ignore', env: this.env });

    return new Promise<CheckOutcome>((resolve, reject) => {
      const onAbort = (): void => {
        killTree(child, 'SIGKILL').catch((error: unknown) => {
          this.logger.debug(`Could not kill aborted health check: ${error instanceof Error ? error.message : String(error)}`);
        });
      };
      signal.addEventListener('abort', onAbort, { once: true });

      child.once('error', (error) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      });
      child.once('exit', (code, exitSignal) => {
        signal.removeEventListener('abort', onAbort);
        resolve({ exitCode: toExitCode(code, exitSignal), elapsedMs: Date.now() - started });
      });
    });
  }
}
