/**
 * Hidden FX loss on platform withdrawals.
 *
 * Platforms often convert at an undisclosed rate that deviates from the market
 * mid-rate, which works as an extra fee. Two modes:
 *
 * - Same currency: loss = applied − received, measured against the applied amount.
 * - Cross currency: loss = expected − received, where expected = applied × mid-rate,
 *   measured against the expected amount (the "deviation").
 *
 * Amounts are rounded to 8 decimal places, percentages to 4.
 */

import { Currency, parseFiniteDecimal, roundAmount, roundPercent, type DecimalInput } from '@withdrawal-audit/core';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { DEFAULT_CLASSIFICATION_CONFIG } from '../config/classification-config.js';

/** Received amounts above 105% of the applied/expected amount are treated as entry errors */
export const RECEIVED_TOLERANCE_FACTOR = new Decimal('1.05');

export type FxErrorKind = 'InvalidInput' | 'ExpectedAmountZero' | 'DataEntryError';

export type FxComputationMode = 'same_currency' | 'cross_currency';

export class FxLossError extends Error {
  readonly kind: FxErrorKind;
  readonly mode: FxComputationMode;

  constructor(kind: FxErrorKind, mode: FxComputationMode, message: string) {
    super(message);
    this.name = 'FxLossError';
    this.kind = kind;
    this.mode = mode;
  }
}

export interface SameCurrencyLoss {
  hasCrossCurrency: false;
  lossAmount: Decimal;
  lossPct: Decimal;
  /** Same-currency withdrawals have no market-rate deviation */
  deviationPct: null;
  expectedAmount: null;
  severeLoss: boolean;
  currency: string | undefined;
}

export interface CrossCurrencyLoss {
  hasCrossCurrency: true;
  lossAmount: Decimal;
  /** Same value as deviationPct; kept so consumers can read lossPct in either mode */
  lossPct: Decimal;
  deviationPct: Decimal;
  expectedAmount: Decimal;
  severeLoss: boolean;
  currencyApplied: string | undefined;
  currencyReceived: string | undefined;
  referenceRate: Decimal;
}

export type FxLossFigures = SameCurrencyLoss | CrossCurrencyLoss;

export interface FxComputationFailure {
  error: FxErrorKind;
  message: string;
  hasCrossCurrency: boolean;
  lossAmount: null;
  lossPct: null;
  deviationPct: null;
  expectedAmount: null;
  severeLoss: false;
}

/**
 * Flat record of one computation: either figures with `error: null`, or an error kind
 * with every figure null. Never both.
 */
export type FxComputationResult =
  | (SameCurrencyLoss & { error: null })
  | (CrossCurrencyLoss & { error: null })
  | FxComputationFailure;

export interface FxLossOptions {
  severeLossThreshold?: number | undefined;
}

function severeLossThresholdOf(options?: FxLossOptions): number {
  return options?.severeLossThreshold ?? DEFAULT_CLASSIFICATION_CONFIG.severeLossThreshold;
}

/**
 * Analyze a same-currency withdrawal: platform fees and shortfalls without conversion.
 *
 * @example
 * computeSameCurrencyLoss(1000, 'USDT', 995)
 * // ok({ lossAmount: 5, lossPct: 0.5, deviationPct: null, severeLoss: false, ... })
 */
export function computeSameCurrencyLoss(
  appliedAmount: DecimalInput,
  currency: string | null | undefined,
  receivedAmount: DecimalInput,
  options?: FxLossOptions
): Result<SameCurrencyLoss, FxLossError> {
  const applied = parseFiniteDecimal(appliedAmount);
  if (!applied || applied.lte(0)) {
    return err(new FxLossError('InvalidInput', 'same_currency', 'Applied amount must be a positive number'));
  }

  const received = parseFiniteDecimal(receivedAmount);
  if (!received) {
    return err(new FxLossError('InvalidInput', 'same_currency', 'Received amount must be a number'));
  }

  if (received.gt(applied.times(RECEIVED_TOLERANCE_FACTOR))) {
    return err(
      new FxLossError(
        'DataEntryError',
        'same_currency',
        `Received amount ${received.toFixed()} exceeds applied amount ${applied.toFixed()} by more than 5%`
      )
    );
  }

  const lossAmount = roundAmount(applied.minus(received));
  const lossPct = roundPercent(lossAmount.div(applied).times(100));

  return ok({
    hasCrossCurrency: false,
    lossAmount,
    lossPct,
    deviationPct: null,
    expectedAmount: null,
    severeLoss: lossPct.gt(severeLossThresholdOf(options)),
    currency: Currency.tryCreate(currency)?.toString(),
  });
}

/**
 * Analyze a cross-currency withdrawal against a reference mid-rate
 * (1 unit of the applied currency = `referenceRate` units of the received currency).
 *
 * @example
 * computeCrossCurrencyLoss(5000, 'CNY', 3050, 'MYR', 0.62)
 * // ok({ expectedAmount: 3100, lossAmount: 50, deviationPct: 1.6129, ... })
 */
export function computeCrossCurrencyLoss(
  appliedAmount: DecimalInput,
  appliedCurrency: string | null | undefined,
  receivedAmount: DecimalInput,
  receivedCurrency: string | null | undefined,
  referenceRate: DecimalInput,
  options?: FxLossOptions
): Result<CrossCurrencyLoss, FxLossError> {
  const applied = parseFiniteDecimal(appliedAmount);
  if (!applied || applied.lte(0)) {
    return err(new FxLossError('InvalidInput', 'cross_currency', 'Applied amount must be a positive number'));
  }

  const rate = parseFiniteDecimal(referenceRate);
  if (!rate || rate.lte(0)) {
    return err(new FxLossError('InvalidInput', 'cross_currency', 'Reference rate must be a positive number'));
  }

  const received = parseFiniteDecimal(receivedAmount);
  if (!received) {
    return err(new FxLossError('InvalidInput', 'cross_currency', 'Received amount must be a number'));
  }

  const expectedAmount = roundAmount(applied.times(rate));
  if (expectedAmount.lte(0)) {
    return err(
      new FxLossError('ExpectedAmountZero', 'cross_currency', 'Expected amount rounds to zero at the reference rate')
    );
  }

  if (received.gt(expectedAmount.times(RECEIVED_TOLERANCE_FACTOR))) {
    return err(
      new FxLossError(
        'DataEntryError',
        'cross_currency',
        `Received amount ${received.toFixed()} exceeds expected amount ${expectedAmount.toFixed()} by more than 5%`
      )
    );
  }

  const lossAmount = roundAmount(expectedAmount.minus(received));
  const deviationPct = roundPercent(lossAmount.div(expectedAmount).times(100));

  return ok({
    hasCrossCurrency: true,
    lossAmount,
    lossPct: deviationPct,
    deviationPct,
    expectedAmount,
    severeLoss: deviationPct.gt(severeLossThresholdOf(options)),
    currencyApplied: Currency.tryCreate(appliedCurrency)?.toString(),
    currencyReceived: Currency.tryCreate(receivedCurrency)?.toString(),
    referenceRate: rate,
  });
}

/**
 * Flatten a computation outcome into the record consumed by display and storage layers.
 */
export function toFxComputationResult<T extends FxLossFigures>(result: Result<T, FxLossError>): FxComputationResult {
  if (result.isOk()) {
    return { ...result.value, error: null };
  }

  return {
    error: result.error.kind,
    message: result.error.message,
    hasCrossCurrency: result.error.mode === 'cross_currency',
    lossAmount: null,
    lossPct: null,
    deviationPct: null,
    expectedAmount: null,
    severeLoss: false,
  };
}

/**
 * Percentage to classify: the market-rate deviation when present, else the plain loss percentage.
 */
export function effectiveLossPct(result: FxComputationResult | FxLossFigures | null | undefined): Decimal | null {
  if (!result) {
    return null;
  }
  return result.deviationPct ?? result.lossPct;
}
