import { parseFiniteDecimal, type DecimalInput } from '@withdrawal-audit/core';

import { DEFAULT_CLASSIFICATION_CONFIG, type ClassificationConfig } from '../config/classification-config.js';
import { fromRuleMatrix, type DimensionResult, type DimensionRuleMatrix } from '../shared/dimension-result.js';

export type FxLossCode = 'unknown' | 'favorable_rate' | 'zero_loss' | 'minimal' | 'moderate' | 'severe';

export type FxLossResult = DimensionResult<FxLossCode>;

export const FX_LOSS_RULES: DimensionRuleMatrix<FxLossCode> = {
  unknown: { label: '汇损数据缺失', score: -1 },
  favorable_rate: { label: '汇率有利', score: 1 },
  zero_loss: { label: '无汇损', score: 1 },
  minimal: { label: '汇损极低', score: 1 },
  moderate: { label: '存在汇损', score: -1 },
  severe: { label: '汇损严重', score: -3 },
};

/**
 * Classify an FX loss percentage into four bands against `config.loss`.
 *
 * Pass the deviation percentage for cross-currency withdrawals and the loss
 * percentage otherwise (see effectiveLossPct). A negative value means the user
 * received more than the mid-rate promised; it scores like zero loss but keeps its
 * own code for display.
 */
export function classifyFxLoss(
  lossPct: DecimalInput,
  config: ClassificationConfig = DEFAULT_CLASSIFICATION_CONFIG
): FxLossResult {
  const pct = parseFiniteDecimal(lossPct);
  if (!pct) {
    return fromRuleMatrix(FX_LOSS_RULES, 'unknown');
  }

  if (pct.isNegative() && !pct.isZero()) return fromRuleMatrix(FX_LOSS_RULES, 'favorable_rate');
  if (pct.isZero()) return fromRuleMatrix(FX_LOSS_RULES, 'zero_loss');
  if (pct.lte(config.loss.normal)) return fromRuleMatrix(FX_LOSS_RULES, 'minimal');
  if (pct.lte(config.loss.warn)) return fromRuleMatrix(FX_LOSS_RULES, 'moderate');
  return fromRuleMatrix(FX_LOSS_RULES, 'severe');
}
