import { toError } from '@tagstore/core';
import { MaintenanceService } from '@tagstore/maintenance';
import type { Command } from 'commander';
import { err, ok } from 'neverthrow';

import { parseCommandOptions, runWithStore } from '../shared/command-execution.js';
import { CompositionCommandOptionsSchema } from '../shared/schemas.js';

import { streamComposition } from './composition-utils.js';

/**
 * Register the composition command.
 */
export function registerCompositionCommand(program: Command): void {
  program
    .command('composition')
    .description('Show tag and label counts per creator, category and visibility')
    .option('--by-currency', 'Also group by currency')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeCompositionCommand(rawOptions);
    });
}

async function executeCompositionCommand(rawOptions: unknown): Promise<void> {
  const { options, output } = parseCommandOptions('composition', CompositionCommandOptionsSchema, rawOptions);
  const byCurrency = options.byCurrency ?? false;

  // Text mode prints rows as the cursor yields them; JSON needs the full array
  const { rows, summary } = await runWithStore('composition', output, async (store) => {
    try {
      const source = new MaintenanceService(store).streamTagstoreComposition({ byCurrency });
      return ok(
        await streamComposition(source, {
          byCurrency,
          collect: output.isJsonMode(),
          emit: (line) => output.log(line),
        })
      );
    } catch (error) {
      return err(toError(error));
    }
  });

  output.json('composition', { byCurrency, rows });
  output.outro(`${summary.tags} tags from ${summary.creators} creators`);
}
