import { hasErrorCode, ValidationError } from '@tagstore/core';
import { getDatabaseConfig, openStoreGateway, type StoreGateway } from '@tagstore/data';
import type { Result } from 'neverthrow';
import type { z } from 'zod';

import { ExitCodes, type ExitCode } from './exit-codes.js';
import { OutputManager } from './output.js';

/**
 * Command handler interface.
 */
export interface CommandHandler<TParams, TResult> {
  execute(params: TParams): Promise<Result<TResult, Error>>;
}

/**
 * Exit code for an error returned by a service.
 */
export function exitCodeForError(error: Error): ExitCode {
  if (error instanceof ValidationError) {
    return ExitCodes.VALIDATION_ERROR;
  }
  // Driver errors (pg, better-sqlite3) carry a string code
  if (hasErrorCode(error)) {
    return ExitCodes.DATABASE_ERROR;
  }
  return ExitCodes.GENERAL_ERROR;
}

/**
 * Validate raw commander options at the CLI boundary. Invalid options exit
 * with INVALID_ARGS.
 */
export function parseCommandOptions<TOptions extends { json?: boolean | undefined }>(
  command: string,
  schema: z.ZodType<TOptions, z.ZodTypeDef, unknown>,
  rawOptions: unknown
): { options: TOptions; output: OutputManager } {
  const validationResult = schema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager('text');
    const firstError = validationResult.error.issues[0];
    return output.error(command, new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
  }

  const options = validationResult.data;
  return { options, output: new OutputManager(options.json ? 'json' : 'text') };
}

/**
 * Open a store session from the environment, run `fn` and close the session.
 * Any failure is reported through `output` and exits the process.
 */
export async function runWithStore<T>(
  command: string,
  output: OutputManager,
  fn: (store: StoreGateway) => Promise<Result<T, Error>>
): Promise<T> {
  const config = getDatabaseConfig();
  if (config.isErr()) {
    return output.error(command, config.error, ExitCodes.CONFIG_ERROR);
  }

  const storeResult = await openStoreGateway(config.value);
  if (storeResult.isErr()) {
    return output.error(command, storeResult.error, ExitCodes.DATABASE_ERROR);
  }

  const store = storeResult.value;
  let result: Result<T, Error>;
  try {
    result = await fn(store);
  } finally {
    await store.close();
  }

  if (result.isErr()) {
    return output.error(command, result.error, exitCodeForError(result.error));
  }
  return result.value;
}
