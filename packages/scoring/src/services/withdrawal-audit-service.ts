/**
 * Imperative shell around the scoring engine:
 * 1. Load the active thresholds for the deployment
 * 2. Fill in a missing cross-currency reference rate from the gateway
 * 3. Evaluate
 * 4. Persist the read model
 */

import { resolveCurrencyPair, wrapError } from '@withdrawal-audit/core';
import { getLogger, type Logger } from '@withdrawal-audit/logger';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { evaluateWithdrawal, type WithdrawalEvaluation } from '../evaluation/evaluate-withdrawal.js';
import type { RawMeasurement } from '../evaluation/raw-measurement.js';
import type { AuditRecord, IAuditRecordStore } from '../ports/audit-record-store.interface.js';
import type { IClassificationConfigProvider } from '../ports/classification-config-provider.interface.js';
import type { IExchangeRateGateway } from '../ports/exchange-rate-gateway.interface.js';

const logger = getLogger('WithdrawalAuditService');

export interface EvaluateRecordOptions {
  deployment?: string | undefined;
  /** Evaluation timestamp stored on the record; defaults to now */
  evaluatedAt?: Date | undefined;
}

export class WithdrawalAuditService {
  constructor(
    private readonly configProvider: IClassificationConfigProvider,
    private readonly recordStore: IAuditRecordStore,
    private readonly rateGateway?: IExchangeRateGateway | undefined
  ) {}

  /**
   * Evaluate a measurement and store the result under `recordId`.
   */
  async evaluateRecord(
    recordId: string,
    measurement: RawMeasurement,
    options?: EvaluateRecordOptions
  ): Promise<Result<WithdrawalEvaluation, Error>> {
    const log = logger.child({ recordId });
    try {
      const configResult = await this.configProvider.getActiveConfig(options?.deployment);
      if (configResult.isErr()) {
        return err(configResult.error);
      }

      const enriched = await this.withReferenceRate(log, measurement);
      const evaluation = evaluateWithdrawal(enriched, configResult.value);

      const saveResult = await this.recordStore.save({
        recordId,
        evaluatedAt: options?.evaluatedAt ?? new Date(),
        measurement: enriched,
        evaluation,
      });
      if (saveResult.isErr()) {
        log.error({ error: saveResult.error }, 'Failed to store audit record');
        return err(saveResult.error);
      }

      const fx = evaluation.crossCurrencyFx ?? evaluation.sameCurrencyFx;
      if (fx && fx.error !== null) {
        log.warn({ fxError: fx.error, message: fx.message }, 'FX figures rejected for record');
      }

      log.info(
        { totalScore: evaluation.result.totalScore, overallCode: evaluation.result.overallCode },
        'Withdrawal record evaluated'
      );

      return ok(evaluation);
    } catch (error) {
      return wrapError(error, `Failed to evaluate withdrawal record ${recordId}`);
    }
  }

  /**
   * Point lookup of a stored record.
   */
  async getRecord(recordId: string): Promise<Result<AuditRecord | undefined, Error>> {
    try {
      return await this.recordStore.findById(recordId);
    } catch (error) {
      return wrapError(error, `Failed to load withdrawal record ${recordId}`);
    }
  }

  /**
   * Returns a copy carrying the gateway's rate when the record crosses currencies,
   * has no rate of its own and has a request timestamp to price at.
   * A gateway failure leaves the record as is; the FX dimension then reads as unknown.
   */
  private async withReferenceRate(log: Logger, measurement: RawMeasurement): Promise<RawMeasurement> {
    if (!this.rateGateway) {
      return measurement;
    }

    const rate = measurement.referenceRate;
    const hasRate = rate !== null && rate !== undefined && rate !== '';
    const pair = resolveCurrencyPair(measurement.appliedCurrency, measurement.receivedCurrency);
    const start = measurement.startTimestamp;

    if (hasRate || pair.mode !== 'cross' || typeof start !== 'number' || !Number.isFinite(start)) {
      return measurement;
    }
    const { from, to } = pair;

    let rateResult: Result<Decimal, Error>;
    try {
      rateResult = await this.rateGateway.getReferenceRate(from, to, new Date(start * 1000));
    } catch (error) {
      rateResult = wrapError(error, 'Reference rate lookup failed');
    }
    if (rateResult.isErr()) {
      log.warn({ from: from.toString(), to: to.toString(), error: rateResult.error }, 'Reference rate unavailable');
      return measurement;
    }

    log.debug({ rate: rateResult.value }, 'Reference rate filled from gateway');
    return { ...measurement, referenceRate: rateResult.value };
  }
}
