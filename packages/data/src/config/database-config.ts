import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

export const DEFAULT_BATCH_SIZE = 1000;

const databaseEnvSchema = z.object({
  TAGSTORE_DB_URL: z.string({ required_error: 'TAGSTORE_DB_URL is not set' }).trim().min(1),
  // Interpolated into the connection's search_path option
  TAGSTORE_DB_SCHEMA: z
    .string()
    .trim()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, { message: 'Invalid schema name' })
    .default('tagstore'),
  TAGSTORE_DB_SSL: z
    .enum(['true', 'false'])
    .default('false')
    .transform((val) => val === 'true'),
  TAGSTORE_BATCH_SIZE: z.coerce.number().int().positive().default(DEFAULT_BATCH_SIZE),
});

export interface DatabaseConfig {
  url: string;
  schema: string;
  ssl: boolean;
  batchSize: number;
}

/**
 * Reads the database configuration from the environment.
 */
export function getDatabaseConfig(env: NodeJS.ProcessEnv = process.env): Result<DatabaseConfig, Error> {
  const result = databaseEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    return err(new Error(`Database configuration is invalid:\n${errors}`));
  }

  return ok({
    url: result.data.TAGSTORE_DB_URL,
    schema: result.data.TAGSTORE_DB_SCHEMA,
    ssl: result.data.TAGSTORE_DB_SSL,
    batchSize: result.data.TAGSTORE_BATCH_SIZE,
  });
}
