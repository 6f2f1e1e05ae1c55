import type { CommandModule } from 'yargs';
import { getLoggerFor } from 'global-logger-factory';
import { loadStackGraph } from '../../config/ConfigLoader';
import { CommandCheckRunner } from '../../runtime/CommandCheckRunner';
import { ProcessLauncher } from '../../runtime/ProcessLauncher';
import type { DependencyGraph } from '../../supervisor/DependencyGraph';
import { HealthProbe } from '../../supervisor/HealthProbe';
import { Supervisor } from '../../supervisor/Supervisor';
import type { TransitionEvent } from '../../supervisor/types';
import {
  EXIT_BLOCKED,
  EXIT_CONFIG_ERROR,
  EXIT_INTERNAL_ERROR,
  initLogger,
  loadEnvFile,
  resolveStackFile,
} from '../runtime';

interface UpArgs {
  file?: string;
  env?: string;
  events: boolean;
  'exit-on-blocked': boolean;
  'restart-delay': number;
  'stop-timeout': number;
  'log-level': string;
  'log-file'?: string;
}

export interface EventRecord {
  unit: string;
  from: string;
  to: string;
  at: string;
}

export function toEventRecord(event: TransitionEvent): EventRecord {
  return { unit: event.unit, from: event.from, to: event.to, at: event.at.toISOString() };
}

export const upCommand: CommandModule<object, UpArgs> = {
  command: 'up',
  describe: 'Start every unit of a stack in dependency order and supervise it',
  builder: (yargs) =>
    yargs
      .option('file', {
        alias: 'f',
        type: 'string',
        description: 'Path to the stack file',
      })
      .option('env', {
        alias: 'e',
        type: 'string',
        description: 'Path to a .env file loaded before the stack starts',
      })
      .option('events', {
        type: 'boolean',
        description: 'Write state transitions to stdout as JSON lines',
        default: false,
      })
      .option('exit-on-blocked', {
        type: 'boolean',
        description: 'Stop the stack and exit when a unit is permanently blocked',
        default: true,
      })
      .option('restart-delay', {
        type: 'number',
        description: 'Milliseconds between an exit and the restart attempt',
        default: 1_000,
      })
      .option('stop-timeout', {
        type: 'number',
        description: 'Milliseconds to wait for each unit to exit on shutdown',
        default: 10_000,
      })
      .option('log-level', {
        type: 'string',
        description: 'Log level',
        default: process.env.HEALTHGATE_LOG_LEVEL ?? 'info',
      })
      .option('log-file', {
        type: 'string',
        description: 'Rotating log file pattern, e.g. logs/healthgate-%DATE%.log',
      }),
  handler: async (argv) => {
    initLogger({ logLevel: argv['log-level'], logFile: argv['log-file'] });
    const logger = getLoggerFor('up');
    if (argv.env) {
      try {
        loadEnvFile(argv.env);
      } catch (error: unknown) {
        logger.error(error instanceof Error ? error.message : String(error));
        process.exitCode = EXIT_CONFIG_ERROR;
        return;
      }
    }

    const file = resolveStackFile(argv.file);
    let graph: DependencyGraph;
    try {
      graph = await loadStackGraph(file);
    } catch (error: unknown) {
      logger.error(error instanceof Error ? error.message : String(error));
      process.exitCode = EXIT_CONFIG_ERROR;
      return;
    }

    const supervisor = new Supervisor({
      launcher: new ProcessLauncher(),
      probe: new HealthProbe(new CommandCheckRunner()),
      restartDelayMs: argv['restart-delay'],
      stopTimeoutMs: argv['stop-timeout'],
    });

    const shutdown = (reason: string): void => {
      logger.info(`${reason}, shutting down...`);
      supervisor.shutdown().catch((error: unknown) => {
        logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = EXIT_INTERNAL_ERROR;
      });
    };

    if (argv.events) {
      supervisor.onTransition((event) => {
        process.stdout.write(`${JSON.stringify(toEventRecord(event))}\n`);
      });
    }
    supervisor.onBlocked(() => {
      if (argv['exit-on-blocked']) {
        process.exitCode = EXIT_BLOCKED;
        shutdown('A unit is permanently blocked');
      }
    });

    process.once('SIGINT', () => shutdown('Received SIGINT'));
    process.once('SIGTERM', () => shutdown('Received SIGTERM'));

    logger.info(`Starting stack from ${file}`);
    try {
      await supervisor.run(graph);
    } catch (error: unknown) {
      logger.error(`Supervisor failed: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = EXIT_INTERNAL_ERROR;
      await supervisor.shutdown();
    }
  },
};
