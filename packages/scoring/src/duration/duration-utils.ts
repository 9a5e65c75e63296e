import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { DEFAULT_CLASSIFICATION_CONFIG, type ClassificationConfig } from '../config/classification-config.js';
import { fromRuleMatrix, type DimensionResult, type DimensionRuleMatrix } from '../shared/dimension-result.js';

export type SpeedCode = 'unknown' | 'instant' | 'fast' | 'normal' | 'slow';

export type SpeedResult = DimensionResult<SpeedCode>;

export const SPEED_RULES: DimensionRuleMatrix<SpeedCode> = {
  unknown: { label: '耗时数据缺失', score: -1 },
  instant: { label: '秒级出款', score: 2 },
  fast: { label: '快速出款', score: 1 },
  normal: { label: '出款时效正常', score: 0 },
  slow: { label: '出款偏慢', score: -2 },
};

/** Longest duration accepted from manual data entry: 30 days */
export const MAX_DURATION_INPUT_MINUTES = 43_200;

const INSTANT_MARKER = '秒级';
const MINUTES_SUFFIX = '分钟';
const HOURS_SUFFIX = '小时';

function isUsableMinutes(minutes: number | null | undefined): minutes is number {
  return typeof minutes === 'number' && Number.isFinite(minutes) && minutes >= 0;
}

/**
 * Processing time in minutes between two Unix timestamps (seconds), rounded to 2 decimals.
 *
 * A missing timestamp or an end before the start means the duration is unavailable.
 */
export function durationFromTimestamps(
  startTimestamp: number | null | undefined,
  endTimestamp: number | null | undefined
): number | null {
  if (
    typeof startTimestamp !== 'number' ||
    typeof endTimestamp !== 'number' ||
    !Number.isFinite(startTimestamp) ||
    !Number.isFinite(endTimestamp)
  ) {
    return null;
  }

  if (endTimestamp < startTimestamp) {
    return null;
  }

  return new Decimal(endTimestamp - startTimestamp).div(60).toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * One decimal place, trailing ".0" removed.
 */
function formatOneDecimal(value: Decimal): string {
  const formatted = value.toFixed(1, Decimal.ROUND_HALF_UP).replace(/\.0$/, '');
  return formatted === '' ? '1' : formatted;
}

/**
 * Human-readable duration.
 *
 * Examples:
 *   0.3  → "秒级"
 *   7.5  → "7.5分钟"
 *   90   → "1.5小时"
 *   120  → "2小时"
 */
export function formatDuration(minutes: number | null | undefined): string {
  if (!isUsableMinutes(minutes)) {
    return '';
  }

  if (minutes < 1) {
    return INSTANT_MARKER;
  }

  if (minutes >= 60) {
    return `${formatOneDecimal(new Decimal(minutes).div(60))}${HOURS_SUFFIX}`;
  }

  return `${formatOneDecimal(new Decimal(minutes))}${MINUTES_SUFFIX}`;
}

/**
 * Classify withdrawal speed. Each threshold belongs to the faster band:
 * exactly `instant` minutes is instant, exactly `fast` is fast.
 */
export function classifySpeed(
  minutes: number | null | undefined,
  config: ClassificationConfig = DEFAULT_CLASSIFICATION_CONFIG
): SpeedResult {
  if (!isUsableMinutes(minutes)) {
    return fromRuleMatrix(SPEED_RULES, 'unknown');
  }

  const { instant, fast, slow } = config.speed;

  if (minutes <= instant) return fromRuleMatrix(SPEED_RULES, 'instant');
  if (minutes <= fast) return fromRuleMatrix(SPEED_RULES, 'fast');
  if (minutes <= slow) return fromRuleMatrix(SPEED_RULES, 'normal');
  return fromRuleMatrix(SPEED_RULES, 'slow');
}

export type DurationInputErrorReason = 'not_numeric' | 'negative' | 'too_long';

export class DurationInputError extends Error {
  readonly reason: DurationInputErrorReason;

  constructor(reason: DurationInputErrorReason, message: string) {
    super(message);
    this.name = 'DurationInputError';
    this.reason = reason;
  }
}

// Plain decimal notation only; Number() would also take 0x1E, 0b101 and 0o17
const DECIMAL_NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

function toNumeric(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && DECIMAL_NUMBER_PATTERN.test(value.trim())) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Validate a duration typed into the audit entry form (minutes).
 *
 * The field is optional: null, undefined and '' are accepted as "not recorded".
 * The error messages are shown to the editor as-is.
 */
export function validateDurationInput(value: unknown): Result<number | null, DurationInputError> {
  if (value === null || value === undefined || value === '') {
    return ok(null);
  }

  const minutes = toNumeric(value);
  if (minutes === undefined) {
    return err(new DurationInputError('not_numeric', '提款耗时必须为数字（分钟）'));
  }

  if (minutes < 0) {
    return err(new DurationInputError('negative', '提款耗时不能为负数，请检查填写的时间'));
  }

  if (minutes > MAX_DURATION_INPUT_MINUTES) {
    return err(new DurationInputError('too_long', '提款耗时超过30天，请核实数据是否正确'));
  }

  return ok(minutes);
}
