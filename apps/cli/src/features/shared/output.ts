import * as p from '@clack/prompts';
import { getLogger } from '@tagstore/logger';
import pc from 'picocolors';

import { ExitCodes, exitWithCode, type ExitCode } from './exit-codes.js';

const logger = getLogger('OutputManager');

export type OutputFormat = 'json' | 'text';

/**
 * Envelope written to stdout in JSON mode, for successes and failures alike.
 */
export interface CLIResponse<T = unknown> {
  success: boolean;
  command: string;
  /** ISO 8601 */
  timestamp: string;
  data?: T;
  error?: { code: string; message: string; stack?: string | undefined } | undefined;
  metadata?: Record<string, unknown> | undefined;
}

const ERROR_CODES: Partial<Record<ExitCode, string>> = {
  [ExitCodes.GENERAL_ERROR]: 'GENERAL_ERROR',
  [ExitCodes.INVALID_ARGS]: 'INVALID_ARGS',
  [ExitCodes.DATABASE_ERROR]: 'DATABASE_ERROR',
  [ExitCodes.VALIDATION_ERROR]: 'VALIDATION_ERROR',
  [ExitCodes.CANCELLED]: 'CANCELLED',
  [ExitCodes.CONFIG_ERROR]: 'CONFIG_ERROR',
};

export function errorCodeFor(exitCode: ExitCode): string {
  return ERROR_CODES[exitCode] ?? 'UNKNOWN_ERROR';
}

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  CONFIG_ERROR: 'Set TAGSTORE_DB_URL (and optionally TAGSTORE_DB_SCHEMA) in the environment or a .env file.',
  DATABASE_ERROR: 'Check that the database is reachable and the schema was created with `tagstore init`.',
  INVALID_ARGS: 'Check your command arguments and try again.\nRun with --help for usage information.',
  VALIDATION_ERROR: 'Currencies are one of BCH, BTC, ETH, LTC, ZEC; thresholds lie between 0 and 1.',
};

/**
 * OutputManager handles formatting and displaying CLI output.
 * Supports both human-readable text output and machine-readable JSON.
 */
export class OutputManager {
  private startTime: number = Date.now();

  constructor(private format: OutputFormat = 'text') {}

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  isTextMode(): boolean {
    return this.format === 'text';
  }

  /**
   * Output a success response (only in JSON mode).
   */
  json<T>(command: string, data: T, metadata?: Record<string, unknown>): void {
    if (this.format === 'json') {
      const response: CLIResponse<T> = {
        success: true,
        command,
        timestamp: new Date().toISOString(),
        data,
        metadata: { duration_ms: Date.now() - this.startTime, ...metadata },
      };
      console.log(JSON.stringify(response, undefined, 2));
    }
  }

  /**
   * Output an error response and exit.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): never {
    const errorCode = errorCodeFor(exitCode);

    if (this.format === 'json') {
      const response: CLIResponse<never> = {
        success: false,
        command,
        timestamp: new Date().toISOString(),
        error: {
          code: errorCode,
          message: error.message,
          stack: process.env['NODE_ENV'] === 'development' ? error.stack : undefined,
        },
      };
      // stdout, so callers can parse the response
      console.log(JSON.stringify(response, undefined, 2));
    } else {
      this.displayTextError(error, errorCode);
    }

    exitWithCode(exitCode);
  }

  /**
   * Display a spinner (only in text mode).
   */
  spinner(): ReturnType<typeof p.spinner> | undefined {
    if (this.format === 'json') {
      return undefined;
    }
    return p.spinner();
  }

  intro(message: string): void {
    if (this.format === 'text') {
      p.intro(pc.bgCyan(pc.black(` ${message} `)));
    }
  }

  outro(message: string): void {
    if (this.format === 'text') {
      p.outro(message);
    }
  }

  note(message: string, title?: string): void {
    if (this.format === 'text') {
      p.note(message, title);
    }
  }

  log(message: string): void {
    if (this.format === 'text') {
      p.log.message(message);
    }
  }

  warn(message: string): void {
    if (this.format === 'text') {
      p.log.warn(pc.yellow(message));
    } else {
      logger.warn(message);
    }
  }

  private displayTextError(error: Error, code: string): void {
    p.log.error(`${pc.red('Error')}: ${error.message}`);

    const tip = ERROR_TIPS[code];
    if (tip) {
      p.note(tip, 'Tip');
    }

    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      logger.debug(`Stack trace:\n${error.stack}`);
    }
  }
}
