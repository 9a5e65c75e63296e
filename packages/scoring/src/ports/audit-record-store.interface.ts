import type { Result } from 'neverthrow';

import type { WithdrawalEvaluation } from '../evaluation/evaluate-withdrawal.js';
import type { RawMeasurement } from '../evaluation/raw-measurement.js';

/**
 * Precomputed read model consumed by presentation layers (REST, shortcodes, SEO snapshots)
 */
export interface AuditRecord {
  recordId: string;
  evaluatedAt: Date;
  measurement: RawMeasurement;
  evaluation: WithdrawalEvaluation;
}

export interface IAuditRecordStore {
  save(record: AuditRecord): Promise<Result<void, Error>>;
  findById(recordId: string): Promise<Result<AuditRecord | undefined, Error>>;
}
