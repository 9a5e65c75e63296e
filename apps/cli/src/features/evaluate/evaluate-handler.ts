// Imperative shell for the evaluate command
// Reads input files and runs the scoring engine over every record

import { readFile } from 'node:fs/promises';

import { getErrorMessage, hasErrorCode } from '@withdrawal-audit/core';
import { getLogger } from '@withdrawal-audit/logger';
import {
  CLASSIFICATION_PROFILES,
  evaluateWithdrawal,
  resolveClassificationConfig,
  type ClassificationConfig,
  type ClassificationConfigOverrides,
  type ClassificationProfileName,
} from '@withdrawal-audit/scoring';
import { err, ok, type Result } from 'neverthrow';

import { CliCommandError } from '../shared/cli-error.js';
import { ExitCodes, type ExitCode } from '../shared/exit-codes.js';

import { parseConfigFile, parseMeasurementFile, type EvaluatedRecord, type EvaluateParams } from './evaluate-utils.js';

const logger = getLogger('EvaluateHandler');

export type ReadTextFile = (path: string) => Promise<string>;

/**
 * Result data for the evaluate command.
 */
export interface EvaluateResult {
  profile: ClassificationProfileName;
  /** Effective thresholds after applying the config file to the profile */
  config: ClassificationConfig;
  records: EvaluatedRecord[];
}

/**
 * Handler for the evaluate command.
 */
export class EvaluateHandler {
  constructor(private readonly readTextFile: ReadTextFile = (path) => readFile(path, 'utf8')) {}

  async execute(params: EvaluateParams): Promise<Result<EvaluateResult, CliCommandError>> {
    let overrides: ClassificationConfigOverrides | undefined;
    if (params.configPath) {
      const contentResult = await this.readInput(params.configPath, 'Config file', ExitCodes.CONFIG_ERROR);
      if (contentResult.isErr()) {
        return err(contentResult.error);
      }

      const overridesResult = parseConfigFile(contentResult.value);
      if (overridesResult.isErr()) {
        return err(overridesResult.error);
      }
      overrides = overridesResult.value;
    }

    const contentResult = await this.readInput(params.file, 'Measurement file', ExitCodes.NOT_FOUND);
    if (contentResult.isErr()) {
      return err(contentResult.error);
    }

    const recordsResult = parseMeasurementFile(contentResult.value);
    if (recordsResult.isErr()) {
      return err(recordsResult.error);
    }

    const config = resolveClassificationConfig(overrides, CLASSIFICATION_PROFILES[params.profile]);
    const records = recordsResult.value.map(({ id, measurement }) => ({
      id,
      evaluation: evaluateWithdrawal(measurement, undefined, config),
    }));

    logger.debug(
      { file: params.file, profile: params.profile, records: records.length, hasOverrides: overrides !== undefined },
      'Measurement file evaluated'
    );

    return ok({ profile: params.profile, config, records });
  }

  /**
   * Missing files map to `notFoundCode`. Other read failures are config errors for
   * the config file and general errors for the measurement file.
   */
  private async readInput(
    path: string,
    label: string,
    notFoundCode: ExitCode
  ): Promise<Result<string, CliCommandError>> {
    try {
      return ok(await this.readTextFile(path));
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return err(new CliCommandError(`${label} not found: ${path}`, notFoundCode, { cause: error }));
      }

      const exitCode = notFoundCode === ExitCodes.CONFIG_ERROR ? ExitCodes.CONFIG_ERROR : ExitCodes.GENERAL_ERROR;
      return err(
        new CliCommandError(`Failed to read ${label.toLowerCase()} ${path}: ${getErrorMessage(error)}`, exitCode, {
          cause: error,
        })
      );
    }
  }
}
