import { resolveCurrencyPair } from '@withdrawal-audit/core';
import type { Decimal } from 'decimal.js';

import {
  resolveClassificationConfig,
  type ClassificationConfig,
  type ClassificationConfigOverrides,
} from '../config/classification-config.js';
import { classifySpeed, durationFromTimestamps, formatDuration } from '../duration/duration-utils.js';
import {
  computeCrossCurrencyLoss,
  computeSameCurrencyLoss,
  effectiveLossPct,
  toFxComputationResult,
  type FxComputationResult,
} from '../fx/fx-loss-calculator.js';
import { classifyFxLoss } from '../fx/fx-severity.js';
import { classifyKycFriction } from '../kyc/kyc-friction.js';
import { aggregateRisk, type OverallResult } from '../risk/risk-aggregator.js';
import { classifySettlement } from '../settlement/settlement-outcome.js';

import type { RawMeasurement } from './raw-measurement.js';

/**
 * Everything derived from one measurement: the banded result plus the raw figures
 * behind it, for display text such as "1.6129% loss" or "expected 3100 vs received 3050".
 */
export interface WithdrawalEvaluation {
  readonly result: OverallResult;
  readonly durationMinutes: number | null;
  /** Human-readable duration, '' when unavailable */
  readonly durationText: string;
  readonly sameCurrencyFx: FxComputationResult | null;
  readonly crossCurrencyFx: FxComputationResult | null;
  /** Deviation when a cross-currency figure exists, else the same-currency loss */
  readonly effectiveLossPct: Decimal | null;
  readonly config: ClassificationConfig;
}

interface FxComputations {
  sameCurrencyFx: FxComputationResult | null;
  crossCurrencyFx: FxComputationResult | null;
}

function isPresent<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined && value !== '';
}

/**
 * Direct minutes win over timestamps when they are a finite number.
 */
export function resolveDurationMinutes(measurement: RawMeasurement): number | null {
  const { durationMinutes } = measurement;
  if (typeof durationMinutes === 'number' && Number.isFinite(durationMinutes)) {
    return durationMinutes;
  }
  return durationFromTimestamps(measurement.startTimestamp, measurement.endTimestamp);
}

/**
 * Pick the FX mode:
 * - matching currencies (or one side unrecorded): same-currency loss
 * - differing currencies with a reference rate: cross-currency deviation
 * - differing currencies without a rate: nothing to compute
 */
export function computeFxLosses(measurement: RawMeasurement, config: ClassificationConfig): FxComputations {
  if (!isPresent(measurement.appliedAmount)) {
    return { sameCurrencyFx: null, crossCurrencyFx: null };
  }

  const options = { severeLossThreshold: config.severeLossThreshold };
  const pair = resolveCurrencyPair(measurement.appliedCurrency, measurement.receivedCurrency);

  if (pair.mode === 'cross') {
    if (!isPresent(measurement.referenceRate)) {
      return { sameCurrencyFx: null, crossCurrencyFx: null };
    }

    const crossResult = computeCrossCurrencyLoss(
      measurement.appliedAmount,
      measurement.appliedCurrency,
      measurement.receivedAmount,
      measurement.receivedCurrency,
      measurement.referenceRate,
      options
    );
    return { sameCurrencyFx: null, crossCurrencyFx: toFxComputationResult(crossResult) };
  }

  const sameResult = computeSameCurrencyLoss(
    measurement.appliedAmount,
    pair.currency?.toString(),
    measurement.receivedAmount,
    options
  );
  return { sameCurrencyFx: toFxComputationResult(sameResult), crossCurrencyFx: null };
}

/**
 * Score one withdrawal test.
 *
 * Pure: the same measurement and overrides always produce an identical evaluation.
 */
export function evaluateWithdrawal(
  measurement: RawMeasurement,
  overrides?: ClassificationConfigOverrides,
  base?: ClassificationConfig
): WithdrawalEvaluation {
  const config = resolveClassificationConfig(overrides, base);

  const durationMinutes = resolveDurationMinutes(measurement);
  const { sameCurrencyFx, crossCurrencyFx } = computeFxLosses(measurement, config);
  const lossPct = effectiveLossPct(crossCurrencyFx) ?? effectiveLossPct(sameCurrencyFx);

  const result = aggregateRisk(
    classifySpeed(durationMinutes, config),
    classifyFxLoss(lossPct, config),
    classifyKycFriction(measurement.kycStatus),
    classifySettlement(measurement.settlementStatus, measurement.receivedAmount)
  );

  return {
    result,
    durationMinutes,
    durationText: formatDuration(durationMinutes),
    sameCurrencyFx,
    crossCurrencyFx,
    effectiveLossPct: lossPct,
    config,
  };
}
