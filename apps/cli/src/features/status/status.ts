import type { Command } from 'commander';
import pc from 'picocolors';

import { parseCommandOptions, runWithStore } from '../shared/command-execution.js';
import { StatusCommandOptionsSchema } from '../shared/schemas.js';

import { StatusHandler, type StoreStatus } from './status-handler.js';

/**
 * Register the status command.
 */
export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show supported currencies and row counts of the tagstore')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeStatusCommand(rawOptions);
    });
}

export function formatStatus(status: StoreStatus): string[] {
  const lines = [`${pc.bold('Currencies')}: ${status.supportedCurrencies.join(', ')}`];
  for (const [table, count] of Object.entries(status.rows)) {
    lines.push(`${table.padEnd(24)} ${String(count).padStart(10)}`);
  }
  lines.push(`${'unmapped addresses'.padEnd(24)} ${String(status.unmappedAddresses).padStart(10)}`);
  return lines;
}

async function executeStatusCommand(rawOptions: unknown): Promise<void> {
  const { output } = parseCommandOptions('status', StatusCommandOptionsSchema, rawOptions);

  const status = await runWithStore('status', output, (store) => {
    return new StatusHandler(store).execute();
  });

  output.json('status', status);
  output.intro('tagstore status');
  for (const line of formatStatus(status)) {
    output.log(line);
  }
}
