/**
 * Supplies market mid-rates for cross-currency withdrawals.
 *
 * The scoring engine never calls this; the audit service uses it to fill in a
 * reference rate the auditor did not record.
 */

import type { Currency } from '@withdrawal-audit/core';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';

export interface IExchangeRateGateway {
  /**
   * Mid-rate at `at`: 1 unit of `from` = rate units of `to`
   */
  getReferenceRate(from: Currency, to: Currency, at: Date): Promise<Result<Decimal, Error>>;
}
