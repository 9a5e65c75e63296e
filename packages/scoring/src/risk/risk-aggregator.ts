import type { SpeedResult } from '../duration/duration-utils.js';
import type { FxLossResult } from '../fx/fx-severity.js';
import type { KycFrictionResult } from '../kyc/kyc-friction.js';
import type { SettlementResult } from '../settlement/settlement-outcome.js';

export type OverallRiskCode = 'high_risk' | 'medium_risk' | 'low_risk';

export type OverallRiskColor = 'red' | 'orange' | 'green';

export interface OverallRiskBand {
  readonly label: string;
  readonly color: OverallRiskColor;
}

export const OVERALL_RISK_BANDS: Readonly<Record<OverallRiskCode, OverallRiskBand>> = {
  high_risk: { label: '高风险', color: 'red' },
  medium_risk: { label: '中风险', color: 'orange' },
  low_risk: { label: '低风险', color: 'green' },
};

/** Totals at or below this are high risk */
export const HIGH_RISK_MAX_SCORE = -4;

/** Totals at or above this are low risk; everything between is medium */
export const LOW_RISK_MIN_SCORE = 1;

export interface OverallResult {
  readonly speed: SpeedResult;
  readonly fx: FxLossResult;
  readonly kyc: KycFrictionResult;
  readonly settlement: SettlementResult;
  readonly totalScore: number;
  readonly overallCode: OverallRiskCode;
  readonly overallLabel: string;
  readonly overallColor: OverallRiskColor;
}

export function bandTotalScore(totalScore: number): OverallRiskCode {
  if (totalScore <= HIGH_RISK_MAX_SCORE) return 'high_risk';
  if (totalScore >= LOW_RISK_MIN_SCORE) return 'low_risk';
  return 'medium_risk';
}

/**
 * Combine the four dimension scores into one risk ranking.
 *
 * Scores are trusted as produced by the classifiers. The medium band spans −3..0.
 */
export function aggregateRisk(
  speed: SpeedResult,
  fx: FxLossResult,
  kyc: KycFrictionResult,
  settlement: SettlementResult
): OverallResult {
  const totalScore = speed.score + fx.score + kyc.score + settlement.score;
  const overallCode = bandTotalScore(totalScore);
  const band = OVERALL_RISK_BANDS[overallCode];

  return {
    speed,
    fx,
    kyc,
    settlement,
    totalScore,
    overallCode,
    overallLabel: band.label,
    overallColor: band.color,
  };
}
