import { parseFiniteDecimal, type DecimalInput } from '@withdrawal-audit/core';

import { fromRuleMatrix, type DimensionResult, type DimensionRuleMatrix } from '../shared/dimension-result.js';

export type SettlementCode = 'success' | 'failure_risk' | 'needs_review';

export type SettlementResult = DimensionResult<SettlementCode>;

export const SETTLEMENT_RULES: DimensionRuleMatrix<SettlementCode> = {
  success: { label: '已成功到账', score: 2 },
  failure_risk: { label: '出款失败风险', score: -3 },
  needs_review: { label: '到账待核实', score: -1 },
};

/**
 * Classify how the withdrawal settled.
 *
 * Recorded statuses are 'success', 'failed', 'blocked' and 'other'; anything else
 * (e.g. 'pending') needs review.
 *
 * A record marked successful without a positive received amount is a failure risk:
 * the platform reported success but no funds were recorded.
 */
export function classifySettlement(
  settlementStatus: string | null | undefined,
  receivedAmount: DecimalInput
): SettlementResult {
  if (settlementStatus === 'success') {
    const received = parseFiniteDecimal(receivedAmount);
    return received?.gt(0)
      ? fromRuleMatrix(SETTLEMENT_RULES, 'success')
      : fromRuleMatrix(SETTLEMENT_RULES, 'failure_risk');
  }

  if (settlementStatus === 'failed' || settlementStatus === 'blocked') {
    return fromRuleMatrix(SETTLEMENT_RULES, 'failure_risk');
  }

  return fromRuleMatrix(SETTLEMENT_RULES, 'needs_review');
}
