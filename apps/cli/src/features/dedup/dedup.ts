import { MaintenanceService } from '@tagstore/maintenance';
import type { Command } from 'commander';

import { parseCommandOptions, runWithStore } from '../shared/command-execution.js';
import { handleCancellation, promptConfirm } from '../shared/prompts.js';
import { DedupCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Register the dedup command.
 */
export function registerDedupCommand(program: Command): void {
  program
    .command('dedup')
    .description('Delete tags duplicated by a newer tag of the same creator')
    .option('--confirm', 'Skip confirmation prompt')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeDedupCommand(rawOptions);
    });
}

async function executeDedupCommand(rawOptions: unknown): Promise<void> {
  const { options, output } = parseCommandOptions('dedup', DedupCommandOptionsSchema, rawOptions);

  if (!options.confirm && !options.json) {
    const shouldProceed = await promptConfirm('Delete duplicate tags? Only the newest tag of each duplicate is kept.');
    if (!shouldProceed) {
      handleCancellation('Dedup cancelled');
    }
  }

  const deleted = await runWithStore('dedup', output, (store) => new MaintenanceService(store).removeDuplicates());

  output.json('dedup', { deleted });
  output.outro(deleted === 0 ? 'No duplicate tags found' : `Removed ${deleted} duplicate tags`);
}
