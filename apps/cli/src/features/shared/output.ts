import * as p from '@clack/prompts';
import { flushLoggers, getLogger } from '@withdrawal-audit/logger';
import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse, type CLIResponseMetadata } from './cli-response.js';
import { ExitCodes, exitCodeToErrorCode, type ExitCode } from './exit-codes.js';

const logger = getLogger('OutputManager');

export type OutputFormat = 'json' | 'text';

export interface OutputManagerOptions {
  /** Receives JSON documents. Defaults to stdout. */
  writeJson?: ((document: string) => void) | undefined;
}

const ERROR_TIPS: Partial<Record<string, { title: string; message: string }>> = {
  INVALID_ARGS: {
    title: 'Tip',
    message: 'Check your command arguments and try again.\nRun with --help for usage information.',
  },
  NOT_FOUND: {
    title: 'Tip',
    message: 'The measurement file was not found.\nDouble-check the path and try again.',
  },
  VALIDATION_ERROR: {
    title: 'Tip',
    message: 'Amounts must be numbers or decimal strings and timestamps whole seconds.',
  },
  CONFIG_ERROR: {
    title: 'How to fix',
    message: 'Config files hold threshold overrides only, e.g.\n{ "speed": { "instant": 2 }, "loss": { "warn": 1.5 } }',
  },
};

/**
 * Routes command output: clack prompts for people, one JSON document on stdout
 * for scripts. Text helpers are no-ops in JSON mode.
 */
export class OutputManager {
  private readonly startedAt = Date.now();
  private readonly writeJson: (document: string) => void;

  constructor(
    private readonly format: OutputFormat = 'text',
    options?: OutputManagerOptions
  ) {
    this.writeJson = options?.writeJson ?? ((document) => process.stdout.write(`${document}\n`));
  }

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  json<T>(command: string, data: T, metadata?: CLIResponseMetadata): void {
    if (!this.isJsonMode()) return;

    const response = createSuccessResponse(command, data, { duration_ms: Date.now() - this.startedAt, ...metadata });
    this.writeJson(JSON.stringify(response, undefined, 2));
  }

  /**
   * Report a failed command and exit. JSON errors go to stdout like any other
   * response.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): never {
    const code = exitCodeToErrorCode(exitCode);

    if (this.isJsonMode()) {
      this.writeJson(JSON.stringify(createErrorResponse(command, error, code), undefined, 2));
    } else {
      p.log.error(`${pc.red('Error')}: ${error.message}`);
      const tip = ERROR_TIPS[code];
      if (tip) {
        p.note(tip.message, tip.title);
      }
    }

    logger.debug({ command, code, error }, 'Command failed');
    flushLoggers();
    process.exit(exitCode);
  }

  intro(message: string): void {
    if (!this.isJsonMode()) p.intro(pc.bgCyan(pc.black(` ${message} `)));
  }

  outro(message: string): void {
    if (!this.isJsonMode()) p.outro(message);
  }

  note(message: string, title?: string): void {
    if (!this.isJsonMode()) p.note(message, title);
  }

  /** In JSON mode warnings go to the log so stdout stays one document. */
  warn(message: string): void {
    if (this.isJsonMode()) {
      logger.warn(message);
    } else {
      p.log.warn(pc.yellow(message));
    }
  }
}
