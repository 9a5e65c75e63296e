// Pure business logic for the evaluate command
// No side effects: parsing, validation and formatting only

import { formatDecimal, getErrorMessage } from '@withdrawal-audit/core';
import {
  CLASSIFICATION_PROFILES,
  isClassificationProfileName,
  parseClassificationOverrides,
  rawMeasurementSchema,
  type ClassificationConfigOverrides,
  type ClassificationProfileName,
  type DimensionResult,
  type FxErrorKind,
  type OverallRiskCode,
  type OverallRiskColor,
  type RawMeasurement,
  type WithdrawalEvaluation,
} from '@withdrawal-audit/scoring';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { CliCommandError } from '../shared/cli-error.js';
import { ExitCodes } from '../shared/exit-codes.js';
import type { EvaluateCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Evaluate command options validated by Zod at CLI boundary
 */
export type EvaluateCommandOptions = z.infer<typeof EvaluateCommandOptionsSchema>;

export interface EvaluateParams {
  file: string;
  profile: ClassificationProfileName;
  configPath?: string | undefined;
}

export interface MeasurementRecord {
  id: string;
  measurement: RawMeasurement;
}

export interface EvaluatedRecord {
  id: string;
  evaluation: WithdrawalEvaluation;
}

export type DimensionName = 'speed' | 'fx' | 'kyc' | 'settlement';

export interface EvaluationSummary {
  id: string;
  totalScore: number;
  overallCode: OverallRiskCode;
  overallLabel: string;
  overallColor: OverallRiskColor;
  dimensions: Record<DimensionName, DimensionResult<string>>;
  durationMinutes: number | null;
  durationText: string;
  /** Percentage classified by the FX dimension, as a plain decimal string */
  effectiveLossPct: string | null;
  fxError: FxErrorKind | null;
}

export type RiskCounts = Record<OverallRiskCode, number>;

const DIMENSION_NAMES: readonly DimensionName[] = ['speed', 'fx', 'kyc', 'settlement'];

const measurementRecordSchema = rawMeasurementSchema.extend({
  id: z.union([z.string().min(1), z.number().int()]).optional(),
});

function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Build evaluate params from the <file> argument and validated flags.
 */
export function buildEvaluateParams(
  file: string | undefined,
  options: EvaluateCommandOptions
): Result<EvaluateParams, CliCommandError> {
  if (!file || file.trim() === '') {
    return err(new CliCommandError('Measurement file path is required', ExitCodes.INVALID_ARGS));
  }

  const profile = options.profile ?? 'default';
  if (!isClassificationProfileName(profile)) {
    const known = Object.keys(CLASSIFICATION_PROFILES).join(', ');
    return err(new CliCommandError(`Unknown profile "${profile}". Expected one of: ${known}`, ExitCodes.INVALID_ARGS));
  }

  return ok({ file, profile, configPath: options.config });
}

/**
 * Parse a measurement file holding one record or a non-empty array of records.
 * Records without an `id` are numbered by position, starting at #1.
 */
export function parseMeasurementFile(content: string): Result<MeasurementRecord[], CliCommandError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return err(
      new CliCommandError(`Measurement file is not valid JSON: ${getErrorMessage(error)}`, ExitCodes.VALIDATION_ERROR)
    );
  }

  const items: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
  if (items.length === 0) {
    return err(new CliCommandError('Measurement file contains no records', ExitCodes.VALIDATION_ERROR));
  }

  const records: MeasurementRecord[] = [];
  const problems: string[] = [];
  const seenIds = new Set<string>();

  items.forEach((item, index) => {
    const result = measurementRecordSchema.safeParse(item);
    if (!result.success) {
      problems.push(`record ${index + 1}: ${formatIssues(result.error.issues)}`);
      return;
    }

    const { id, ...measurement } = result.data;
    const recordId = id === undefined ? `#${index + 1}` : String(id);
    if (seenIds.has(recordId)) {
      problems.push(`record ${index + 1}: duplicate id "${recordId}"`);
      return;
    }

    seenIds.add(recordId);
    records.push({ id: recordId, measurement });
  });

  if (problems.length > 0) {
    return err(new CliCommandError(`Invalid measurement file: ${problems.join('; ')}`, ExitCodes.VALIDATION_ERROR));
  }

  return ok(records);
}

/**
 * Parse a threshold override file.
 */
export function parseConfigFile(content: string): Result<ClassificationConfigOverrides, CliCommandError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return err(new CliCommandError(`Config file is not valid JSON: ${getErrorMessage(error)}`, ExitCodes.CONFIG_ERROR));
  }

  return parseClassificationOverrides(parsed).mapErr(
    (error) => new CliCommandError(error.message, ExitCodes.CONFIG_ERROR, { cause: error })
  );
}

export function toEvaluationSummary(record: EvaluatedRecord): EvaluationSummary {
  const { evaluation } = record;
  const { result } = evaluation;
  const fx = evaluation.crossCurrencyFx ?? evaluation.sameCurrencyFx;

  return {
    id: record.id,
    totalScore: result.totalScore,
    overallCode: result.overallCode,
    overallLabel: result.overallLabel,
    overallColor: result.overallColor,
    dimensions: {
      speed: result.speed,
      fx: result.fx,
      kyc: result.kyc,
      settlement: result.settlement,
    },
    durationMinutes: evaluation.durationMinutes,
    durationText: evaluation.durationText,
    effectiveLossPct: evaluation.effectiveLossPct ? formatDecimal(evaluation.effectiveLossPct, 4) : null,
    fxError: fx?.error ?? null,
  };
}

export function countByRisk(summaries: readonly EvaluationSummary[]): RiskCounts {
  const counts: RiskCounts = { high_risk: 0, medium_risk: 0, low_risk: 0 };
  for (const summary of summaries) {
    counts[summary.overallCode] += 1;
  }
  return counts;
}

/**
 * Signed score: "+2", "0", "-3"
 */
export function formatScore(score: number): string {
  return score > 0 ? `+${score}` : String(score);
}

function dimensionDetail(name: DimensionName, summary: EvaluationSummary): string | undefined {
  if (name === 'speed') {
    return summary.durationText || undefined;
  }
  if (name === 'fx') {
    if (summary.effectiveLossPct !== null) return `${summary.effectiveLossPct}%`;
    return summary.fxError ?? undefined;
  }
  return undefined;
}

/**
 * One line per dimension plus the total, for the text summary.
 */
export function formatEvaluationLines(summary: EvaluationSummary): string[] {
  const lines = DIMENSION_NAMES.map((name) => {
    const dimension = summary.dimensions[name];
    const detail = dimensionDetail(name, summary);
    const base = `${name.padEnd(10)}  ${dimension.label} (${formatScore(dimension.score)})`;
    return detail ? `${base}  ${detail}` : base;
  });

  lines.push(`${'total'.padEnd(10)}  ${formatScore(summary.totalScore)}`);
  return lines;
}

export function formatRiskCounts(counts: RiskCounts): string {
  const total = counts.high_risk + counts.medium_risk + counts.low_risk;
  const noun = total === 1 ? 'record' : 'records';
  return `${total} ${noun} evaluated: ${counts.high_risk} high, ${counts.medium_risk} medium, ${counts.low_risk} low risk`;
}
