import { fromRuleMatrix, type DimensionResult, type DimensionRuleMatrix } from '../shared/dimension-result.js';

export type KycFrictionCode =
  | 'insufficient_info'
  | 'low_friction'
  | 'light_friction'
  | 'moderate_friction'
  | 'high_friction';

export type KycFrictionResult = DimensionResult<KycFrictionCode>;

export const KYC_FRICTION_RULES: DimensionRuleMatrix<KycFrictionCode> = {
  insufficient_info: { label: '验证信息不足', score: -1 },
  low_friction: { label: '无需额外验证', score: 1 },
  light_friction: { label: '轻度验证', score: 0 },
  moderate_friction: { label: '存在验证环节', score: -1 },
  high_friction: { label: '验证门槛高', score: -2 },
};

// Status tokens as recorded by auditors. Matching is exact and case-sensitive.
const LOW_FRICTION_STATUSES: ReadonlySet<string> = new Set(['none']);
const LIGHT_FRICTION_STATUSES: ReadonlySet<string> = new Set(['sms', 'id_card']);
const HIGH_FRICTION_STATUSES: ReadonlySet<string> = new Set(['video', 'face', 'stuck']);

/**
 * Classify the KYC hurdle met during the withdrawal.
 *
 * An unrecognized token lands in moderate friction, not insufficient info: we got a
 * value, we just don't know how hard it was.
 */
export function classifyKycFriction(kycStatus: string | null | undefined): KycFrictionResult {
  if (kycStatus === null || kycStatus === undefined || kycStatus.trim() === '') {
    return fromRuleMatrix(KYC_FRICTION_RULES, 'insufficient_info');
  }

  if (LOW_FRICTION_STATUSES.has(kycStatus)) return fromRuleMatrix(KYC_FRICTION_RULES, 'low_friction');
  if (LIGHT_FRICTION_STATUSES.has(kycStatus)) return fromRuleMatrix(KYC_FRICTION_RULES, 'light_friction');
  if (HIGH_FRICTION_STATUSES.has(kycStatus)) return fromRuleMatrix(KYC_FRICTION_RULES, 'high_friction');
  return fromRuleMatrix(KYC_FRICTION_RULES, 'moderate_friction');
}
