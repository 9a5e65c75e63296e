/**
 * Classification of a single audit dimension (speed, FX loss, KYC friction, settlement).
 *
 * `label` and `tags` are consumed verbatim by display and structured-data (Schema.org
 * additionalProperty) generators, so they are fixed data rather than derived text.
 */
export interface DimensionResult<TCode extends string = string> {
  readonly code: TCode;
  readonly label: string;
  readonly score: number;
  readonly tags: readonly string[];
}

/**
 * One row of a dimension's rule matrix
 */
export interface DimensionRule {
  readonly label: string;
  readonly score: number;
}

export type DimensionRuleMatrix<TCode extends string> = Readonly<Record<TCode, DimensionRule>>;

/**
 * Build the result for `code` from its rule matrix row. Tags carry the label.
 */
export function fromRuleMatrix<TCode extends string>(
  matrix: DimensionRuleMatrix<TCode>,
  code: TCode
): DimensionResult<TCode> {
  const rule = matrix[code];
  return {
    code,
    label: rule.label,
    score: rule.score,
    tags: [rule.label],
  };
}
