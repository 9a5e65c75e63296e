export * from './config/classification-config.js';
export * from './config/classification-config.schema.js';
export * from './shared/dimension-result.js';
export * from './duration/duration-utils.js';
export * from './fx/fx-loss-calculator.js';
export * from './fx/fx-severity.js';
export * from './kyc/kyc-friction.js';
export * from './settlement/settlement-outcome.js';
export * from './risk/risk-aggregator.js';
export * from './evaluation/raw-measurement.js';
export * from './evaluation/evaluate-withdrawal.js';
export type * from './ports/audit-record-store.interface.js';
export type * from './ports/classification-config-provider.interface.js';
export type * from './ports/exchange-rate-gateway.interface.js';
export * from './services/withdrawal-audit-service.js';
