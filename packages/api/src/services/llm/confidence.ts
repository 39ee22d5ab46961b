import type { ConfidenceLevel, DocumentSpec, FieldType, ReasonCode, ReasonedValue } from './schemas/document-spec';

/** Relative weight of each field type in the overall score. */
export type ConfidenceWeights = Record<FieldType, number>;

export const DEFAULT_CONFIDENCE_WEIGHTS: ConfidenceWeights = {
  number: 0.3,
  date: 0.25,
  table: 0.2,
  string: 0.15,
  boolean: 0.1
};

const LEVEL_SCORE: Record<ConfidenceLevel, number> = { high: 0.9, medium: 0.6, low: 0.3 };

/**
 * Numeric score for one field from its confidence level and reason code.
 *
 * @example
 * ```typescript
 * fieldConfidenceScore('high', 'explicit_label') // 0.945
 * fieldConfidenceScore('medium', 'conflict') // 0.3
 * ```
 */
export function fieldConfidenceScore(level: ConfidenceLevel, reasonCode: ReasonCode): number {
  const base = LEVEL_SCORE[level];
  switch (reasonCode) {
    case 'explicit_label':
      return Math.min(1, base * 1.05);
    case 'nearby_header':
      return base;
    case 'inferred_layout':
      return base * 0.9;
    case 'conflict':
      return base * 0.5;
    case 'missing':
      return 0;
  }
}

export interface ConfidenceResult {
  overall: number;
  perField: Record<string, number>;
}

const round3 = (n: number) => Math.round(n * 1000) / 1000;

/**
 * Weighted confidence over the extracted fields.
 *
 * Only required fields count toward the overall score when the spec marks
 * any; otherwise every field does. A field that is absent from the output
 * or has a null value scores 0.
 */
export function calculateWeightedConfidence(
  spec: DocumentSpec,
  fields: Record<string, ReasonedValue>,
  weights: ConfidenceWeights = DEFAULT_CONFIDENCE_WEIGHTS
): ConfidenceResult {
  const perField: Record<string, number> = {};
  for (const field of spec.fields) {
    const entry = fields[field.key];
    perField[field.key] =
      entry === undefined || entry.value === null ? 0 : round3(fieldConfidenceScore(entry.confidence, entry.reason_code));
  }

  const required = spec.fields.filter((f) => f.required);
  const scored = required.length > 0 ? required : spec.fields;
  let totalWeight = 0;
  let total = 0;
  for (const field of scored) {
    const weight = weights[field.type];
    totalWeight += weight;
    total += weight * (perField[field.key] ?? 0);
  }

  return { overall: totalWeight > 0 ? round3(total / totalWeight) : 0, perField };
}
