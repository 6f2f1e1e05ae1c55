import type { CommandModule } from 'yargs';
import { loadStackFile } from '../../config/ConfigLoader';
import { formatDuration } from '../../config/duration';
import { DependencyGraph } from '../../supervisor/DependencyGraph';
import type { UnitConfig } from '../../supervisor/types';
import { EXIT_CONFIG_ERROR, resolveStackFile } from '../runtime';

interface PlanArgs {
  file?: string;
  json: boolean;
}

export interface PlanBatch {
  index: number;
  units: string[];
}

/**
 * Start batches of a graph, each sorted by name for stable output.
 */
export function planBatches(graph: DependencyGraph): PlanBatch[] {
  return Array.from(graph.topologicalBatches(), (batch, index) => ({ index, units: [ ...batch ].sort() }));
}

export function describeUnit(unit: UnitConfig): string {
  const parts = [ `restart=${unit.restart}` ];
  if (unit.dependsOn.length > 0) {
    parts.push(`after=${unit.dependsOn.join(',')}`);
  }
  const check = unit.healthcheck;
  if (check) {
    parts.push(`check every ${formatDuration(check.intervalMs)}, timeout ${formatDuration(check.timeoutMs)}, ` +
      `retries ${check.retries}, start period ${formatDuration(check.startPeriodMs)}`);
  } else {
    parts.push('no health check');
  }
  return `${unit.name} (${parts.join('; ')})`;
}

export const planCommand: CommandModule<object, PlanArgs> = {
  command: 'plan',
  describe: 'Validate a stack file and print its start batches',
  builder: (yargs) =>
    yargs
      .option('file', {
        alias: 'f',
        type: 'string',
        description: 'Path to the stack file',
      })
      .option('json', {
        type: 'boolean',
        description: 'Output as JSON',
        default: false,
      }),
  handler: async (argv) => {
    const file = resolveStackFile(argv.file);
    let graph: DependencyGraph;
    try {
      graph = DependencyGraph.fromUnits(await loadStackFile(file));
    } catch (error: unknown) {
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = EXIT_CONFIG_ERROR;
      return;
    }

    const batches = planBatches(graph);
    if (argv.json) {
      console.log(JSON.stringify(batches, null, 2));
      return;
    }

    for (const batch of batches) {
      console.log(`Batch ${batch.index}:`);
      for (const name of batch.units) {
        console.log(`  ${describeUnit(graph.get(name))}`);
      }
    }
  },
};
