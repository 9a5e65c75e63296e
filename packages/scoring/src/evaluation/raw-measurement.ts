import type { DecimalInput } from '@withdrawal-audit/core';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

/**
 * Raw figures recorded for one real-money withdrawal test. Never mutated.
 *
 * Every field may be missing: a partial record still evaluates, with the affected
 * dimensions falling back to their "unknown" classification.
 */
export interface RawMeasurement {
  /** Amount requested, in the applied currency */
  appliedAmount?: DecimalInput;
  /** Amount credited, in the received currency */
  receivedAmount?: DecimalInput;
  appliedCurrency?: string | null | undefined;
  receivedCurrency?: string | null | undefined;
  /** Market mid-rate: 1 unit of applied currency = N units of received currency */
  referenceRate?: DecimalInput;
  /** Unix timestamp (seconds) of the withdrawal request */
  startTimestamp?: number | null | undefined;
  /** Unix timestamp (seconds) of the funds arriving */
  endTimestamp?: number | null | undefined;
  /** Processing time in minutes; takes precedence over the timestamps */
  durationMinutes?: number | null | undefined;
  kycStatus?: string | null | undefined;
  /** 'success' | 'failed' | 'blocked' | 'other', or any other recorded status */
  settlementStatus?: string | null | undefined;
}

const decimalFieldSchema = z.union([z.number(), z.string()]).nullish();

export const rawMeasurementSchema = z.object({
  appliedAmount: decimalFieldSchema,
  receivedAmount: decimalFieldSchema,
  appliedCurrency: z.string().nullish(),
  receivedCurrency: z.string().nullish(),
  referenceRate: decimalFieldSchema,
  startTimestamp: z.number().int().nullish(),
  endTimestamp: z.number().int().nullish(),
  durationMinutes: z.number().nullish(),
  kycStatus: z.string().nullish(),
  settlementStatus: z.string().nullish(),
});

/**
 * Validate an untrusted measurement (JSON file, HTTP body). Unknown keys are dropped.
 */
export function parseRawMeasurement(input: unknown): Result<RawMeasurement, Error> {
  const result = rawMeasurementSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return err(new Error(`Invalid withdrawal measurement: ${issues.join('; ')}`));
  }
  return ok(result.data);
}
