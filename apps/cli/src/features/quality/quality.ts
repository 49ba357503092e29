import { DEFAULT_QUALITY_THRESHOLD } from '@tagstore/core';
import { QualityService } from '@tagstore/maintenance';
import type { Command } from 'commander';

import { parseCommandOptions, runWithStore } from '../shared/command-execution.js';
import {
  QualityCalculateCommandOptionsSchema,
  QualityLowCommandOptionsSchema,
  QualityShowCommandOptionsSchema,
} from '../shared/schemas.js';

import { formatLowQualityAddresses, formatQualityMeasures } from './quality-utils.js';

/**
 * Register the quality command and its subcommands.
 */
export function registerQualityCommand(program: Command): void {
  const quality = program.command('quality').description('Address quality measures');

  quality
    .command('show')
    .description('Show count, average and standard deviation of address quality')
    .option('--currency <code>', 'Restrict to one currency (BCH, BTC, ETH, LTC, ZEC)')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeQualityShow(rawOptions);
    });

  quality
    .command('calculate')
    .description('Recompute the quality of every address')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeQualityCalculate(rawOptions);
    });

  quality
    .command('low')
    .description('List addresses at or below a quality threshold with their labels')
    .option('--threshold <value>', `Quality threshold between 0 and 1 (default: ${DEFAULT_QUALITY_THRESHOLD})`)
    .option('--currency <code>', 'Restrict to one currency (BCH, BTC, ETH, LTC, ZEC)')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeQualityLow(rawOptions);
    });
}

async function executeQualityShow(rawOptions: unknown): Promise<void> {
  const { options, output } = parseCommandOptions('quality-show', QualityShowCommandOptionsSchema, rawOptions);

  const measures = await runWithStore('quality-show', output, (store) =>
    new QualityService(store).getQualityMeasures(options.currency)
  );

  output.json('quality-show', measures);
  output.note(formatQualityMeasures(measures, options.currency), 'Address quality');
}

async function executeQualityCalculate(rawOptions: unknown): Promise<void> {
  const { output } = parseCommandOptions('quality-calculate', QualityCalculateCommandOptionsSchema, rawOptions);

  const spinner = output.spinner();
  spinner?.start('Calculating address quality');
  const measures = await runWithStore('quality-calculate', output, (store) =>
    new QualityService(store).calculateQualityMeasures()
  );
  spinner?.stop('Address quality calculated');

  output.json('quality-calculate', measures);
  output.note(formatQualityMeasures(measures), 'Address quality');
}

async function executeQualityLow(rawOptions: unknown): Promise<void> {
  const { options, output } = parseCommandOptions('quality-low', QualityLowCommandOptionsSchema, rawOptions);
  const threshold = options.threshold ?? DEFAULT_QUALITY_THRESHOLD;

  const addresses = await runWithStore('quality-low', output, (store) =>
    new QualityService(store).lowQualityAddressLabels(threshold, options.currency)
  );

  output.json('quality-low', { addresses, threshold });
  if (addresses.length === 0) {
    output.outro(`No addresses with quality at or below ${threshold}`);
    return;
  }
  for (const line of formatLowQualityAddresses(addresses)) {
    output.log(line);
  }
  output.outro(`${addresses.length} addresses with quality at or below ${threshold}`);
}
