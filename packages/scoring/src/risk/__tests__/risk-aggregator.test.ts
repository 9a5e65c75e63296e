import { describe, expect, it } from 'vitest';

import { classifySpeed } from '../../duration/duration-utils.js';
import { classifyFxLoss } from '../../fx/fx-severity.js';
import { classifyKycFriction } from '../../kyc/kyc-friction.js';
import { classifySettlement } from '../../settlement/settlement-outcome.js';
import { aggregateRisk, bandTotalScore } from '../risk-aggregator.js';

describe('bandTotalScore', () => {
  it('bands at the boundaries', () => {
    expect(bandTotalScore(-10)).toBe('high_risk');
    expect(bandTotalScore(-4)).toBe('high_risk');
    expect(bandTotalScore(-3)).toBe('medium_risk');
    expect(bandTotalScore(0)).toBe('medium_risk');
    expect(bandTotalScore(1)).toBe('low_risk');
    expect(bandTotalScore(6)).toBe('low_risk');
  });
});

describe('aggregateRisk', () => {
  it('sums the dimension scores into a low-risk result', () => {
    const speed = classifySpeed(3);
    const fx = classifyFxLoss(0.3);
    const kyc = classifyKycFriction('none');
    const settlement = classifySettlement('success', 995);

    expect(aggregateRisk(speed, fx, kyc, settlement)).toEqual({
      speed,
      fx,
      kyc,
      settlement,
      totalScore: 6,
      overallCode: 'low_risk',
      overallLabel: '低风险',
      overallColor: 'green',
    });
  });

  it('returns low risk for a total of 1', () => {
    const result = aggregateRisk(
      classifySpeed(120),
      classifyFxLoss(1.2),
      classifyKycFriction('sms'),
      classifySettlement('success', 100)
    );

    expect(result.totalScore).toBe(1);
    expect(result.overallCode).toBe('low_risk');
  });

  it('returns medium risk for a total of zero', () => {
    const zero = aggregateRisk(
      classifySpeed(120),
      classifyFxLoss(1.2),
      classifyKycFriction('bank_statement'),
      classifySettlement('success', 100)
    );

    expect(zero.totalScore).toBe(0);
    expect(zero.overallCode).toBe('medium_risk');
    expect(zero.overallLabel).toBe('中风险');
    expect(zero.overallColor).toBe('orange');
  });

  it('returns high risk for a total of -4 or lower', () => {
    const result = aggregateRisk(
      classifySpeed(null),
      classifyFxLoss(null),
      classifyKycFriction(null),
      classifySettlement(null, null)
    );

    expect(result.totalScore).toBe(-4);
    expect(result.overallCode).toBe('high_risk');
    expect(result.overallLabel).toBe('高风险');
    expect(result.overallColor).toBe('red');
  });

  it('reaches the minimum total of -10', () => {
    const result = aggregateRisk(
      classifySpeed(600),
      classifyFxLoss(8),
      classifyKycFriction('video'),
      classifySettlement('blocked', 0)
    );

    expect(result.totalScore).toBe(-10);
    expect(result.overallCode).toBe('high_risk');
  });
});
