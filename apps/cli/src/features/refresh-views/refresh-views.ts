import { MaintenanceService } from '@tagstore/maintenance';
import type { Command } from 'commander';

import { parseCommandOptions, runWithStore } from '../shared/command-execution.js';
import { RefreshViewsCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Register the refresh-views command.
 */
export function registerRefreshViewsCommand(program: Command): void {
  program
    .command('refresh-views')
    .description('Refresh the materialized views after ingestion or maintenance')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeRefreshViewsCommand(rawOptions);
    });
}

async function executeRefreshViewsCommand(rawOptions: unknown): Promise<void> {
  const { output } = parseCommandOptions('refresh-views', RefreshViewsCommandOptionsSchema, rawOptions);

  const spinner = output.spinner();
  spinner?.start('Refreshing materialized views');
  const views = await runWithStore('refresh-views', output, (store) =>
    new MaintenanceService(store).refreshMaterializedViews()
  );
  spinner?.stop(`Refreshed ${views.length} views`);

  output.json('refresh-views', { views });
}
