/**
 * Thresholds used by every classifier.
 *
 * The FX loss bands (`loss.normal`, `loss.warn`) drive the four-band severity
 * classification. `severeLossThreshold` drives the calculator's own binary
 * `severeLoss` flag. They are separate settings and are tuned independently.
 */

export interface SpeedThresholds {
  /** Minutes at or below which a withdrawal counts as instant */
  readonly instant: number;
  /** Minutes at or below which a withdrawal counts as fast */
  readonly fast: number;
  /** Minutes at or below which a withdrawal is still normal; above is slow */
  readonly slow: number;
}

export interface LossThresholds {
  /** Loss percentage at or below which the loss is minimal */
  readonly normal: number;
  /** Loss percentage at or below which the loss is moderate; above is severe */
  readonly warn: number;
}

export interface ClassificationConfig {
  readonly speed: SpeedThresholds;
  readonly loss: LossThresholds;
  /** Loss/deviation percentage above which `severeLoss` is set */
  readonly severeLossThreshold: number;
}

export interface SpeedThresholdOverrides {
  instant?: number | undefined;
  fast?: number | undefined;
  slow?: number | undefined;
}

export interface LossThresholdOverrides {
  normal?: number | undefined;
  warn?: number | undefined;
}

/**
 * Per-call overrides. Unset fields keep the base value, field by field.
 */
export interface ClassificationConfigOverrides {
  speed?: SpeedThresholdOverrides | undefined;
  loss?: LossThresholdOverrides | undefined;
  severeLossThreshold?: number | undefined;
}

function freezeConfig(config: ClassificationConfig): ClassificationConfig {
  return Object.freeze({
    speed: Object.freeze({ ...config.speed }),
    loss: Object.freeze({ ...config.loss }),
    severeLossThreshold: config.severeLossThreshold,
  });
}

export const DEFAULT_CLASSIFICATION_CONFIG: ClassificationConfig = freezeConfig({
  speed: { instant: 5, fast: 30, slow: 240 },
  loss: { normal: 0.5, warn: 2.0 },
  severeLossThreshold: 2.0,
});

/**
 * Merge overrides into a base config field by field and freeze the result.
 * `instant <= fast <= slow` is not enforced; supplying a sane ordering is the caller's job.
 */
export function resolveClassificationConfig(
  overrides?: ClassificationConfigOverrides,
  base: ClassificationConfig = DEFAULT_CLASSIFICATION_CONFIG
): ClassificationConfig {
  if (!overrides) {
    return Object.isFrozen(base) ? base : freezeConfig(base);
  }

  return freezeConfig({
    speed: {
      instant: overrides.speed?.instant ?? base.speed.instant,
      fast: overrides.speed?.fast ?? base.speed.fast,
      slow: overrides.speed?.slow ?? base.speed.slow,
    },
    loss: {
      normal: overrides.loss?.normal ?? base.loss.normal,
      warn: overrides.loss?.warn ?? base.loss.warn,
    },
    severeLossThreshold: overrides.severeLossThreshold ?? base.severeLossThreshold,
  });
}

/**
 * Named deployment profiles.
 *
 * - default: 5 / 30 / 240 minute speed bands
 * - strict:  1 / 15 / 120 minute speed bands, same loss thresholds
 */
export const CLASSIFICATION_PROFILES = {
  default: DEFAULT_CLASSIFICATION_CONFIG,
  strict: resolveClassificationConfig({ speed: { instant: 1, fast: 15, slow: 120 } }),
} as const satisfies Record<string, ClassificationConfig>;

export type ClassificationProfileName = keyof typeof CLASSIFICATION_PROFILES;

export function isClassificationProfileName(name: string): name is ClassificationProfileName {
  return Object.prototype.hasOwnProperty.call(CLASSIFICATION_PROFILES, name);
}
