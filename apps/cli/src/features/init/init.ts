import { toError } from '@tagstore/core';
import { closeDatabase, createDatabase, createTagstoreSchema, getDatabaseConfig } from '@tagstore/data';
import type { Command } from 'commander';

import { exitCodeForError, parseCommandOptions } from '../shared/command-execution.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { InitCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Register the init command.
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create the tagstore tables, views and procedures in the configured schema')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeInitCommand(rawOptions);
    });
}

async function executeInitCommand(rawOptions: unknown): Promise<void> {
  const { output } = parseCommandOptions('init', InitCommandOptionsSchema, rawOptions);

  const config = getDatabaseConfig();
  if (config.isErr()) {
    return output.error('init', config.error, ExitCodes.CONFIG_ERROR);
  }

  // The currency enum does not exist yet, so no store session here
  const db = createDatabase(config.value);
  let failure: Error | undefined;
  try {
    await createTagstoreSchema(db, config.value.schema);
  } catch (error) {
    failure = toError(error);
  } finally {
    await closeDatabase(db);
  }

  if (failure) {
    return output.error('init', failure, exitCodeForError(failure));
  }

  output.json('init', { schema: config.value.schema });
  output.outro(`Created tagstore schema ${config.value.schema}`);
}
