/**
 * @fileoverview Document Specification Schema
 *
 * A document spec names the fields extraction should pull out of an uploaded
 * PDF. Specs are stored as JSON artifacts and referenced from jobs by
 * `spec_ref`. From a spec we derive the Zod schema the model output must
 * satisfy: every field is wrapped with a confidence level, a reason code and
 * a short evidence excerpt.
 *
 * Example spec:
 * ```json
 * {
 *   "name": "lease",
 *   "instructions": "Amounts are monthly unless stated otherwise.",
 *   "fields": [
 *     { "key": "tenant", "type": "string", "required": true },
 *     { "key": "rent", "type": "number", "required": true },
 *     { "key": "start_date", "type": "date" },
 *     { "key": "charges", "type": "table", "columns": [
 *       { "key": "label", "type": "string" }, { "key": "amount", "type": "number" } ] }
 *   ]
 * }
 * ```
 */

import { z } from 'zod';

const FieldKey = z
  .string()
  .regex(/^[a-z][a-z0-9_]*$/, 'keys are lower snake_case')
  .max(64);

export const ScalarTypeSchema = z.enum(['string', 'number', 'boolean', 'date']);
export type ScalarType = z.infer<typeof ScalarTypeSchema>;

export const FieldTypeSchema = z.enum(['string', 'number', 'boolean', 'date', 'table']);
export type FieldType = z.infer<typeof FieldTypeSchema>;

export const ColumnSpecSchema = z.object({
  key: FieldKey,
  type: ScalarTypeSchema,
  description: z.string().max(500).optional()
});
export type ColumnSpec = z.infer<typeof ColumnSpecSchema>;

export const FieldSpecSchema = z
  .object({
    key: FieldKey,
    type: FieldTypeSchema,
    description: z.string().max(500).optional(),
    required: z.boolean().default(false),
    columns: z.array(ColumnSpecSchema).min(1).optional()
  })
  .superRefine((field, ctx) => {
    if (field.type === 'table' && !field.columns) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['columns'], message: 'table fields need columns' });
    }
    if (field.type !== 'table' && field.columns) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['columns'], message: 'only table fields take columns' });
    }
  });
export type FieldSpec = z.infer<typeof FieldSpecSchema>;

export const DocumentSpecSchema = z
  .object({
    name: z.string().trim().min(1),
    instructions: z.string().max(4000).optional(),
    fields: z.array(FieldSpecSchema).min(1).max(100)
  })
  .superRefine((spec, ctx) => {
    const seen = new Set<string>();
    spec.fields.forEach((field, index) => {
      if (seen.has(field.key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['fields', index, 'key'], message: `duplicate key ${field.key}` });
      }
      seen.add(field.key);
    });
  });
export type DocumentSpec = z.infer<typeof DocumentSpecSchema>;

export type ParseSpecResult = { success: true; spec: DocumentSpec } | { success: false; issues: string[] };

/** Decode and validate a stored spec. */
export function parseDocumentSpec(bytes: Uint8Array): ParseSpecResult {
  let raw: unknown;
  try {
    raw = JSON.parse(new TextDecoder().decode(bytes));
  } catch {
    return { success: false, issues: ['spec is not valid JSON'] };
  }
  const parsed = DocumentSpecSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      issues: parsed.error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    };
  }
  return { success: true, spec: parsed.data };
}

export const ConfidenceLevelSchema = z.enum(['low', 'medium', 'high']);
export type ConfidenceLevel = z.infer<typeof ConfidenceLevelSchema>;

export const ReasonCodeSchema = z.enum(['explicit_label', 'nearby_header', 'inferred_layout', 'conflict', 'missing']);
export type ReasonCode = z.infer<typeof ReasonCodeSchema>;

/**
 * Value wrapped with the model's confidence and a categorical reason.
 * Every property is required (nullable where absent) so the schema works
 * with strict structured-output mode.
 */
const ReasonedField = (valueSchema: z.ZodTypeAny) =>
  z.object({
    value: valueSchema,
    confidence: ConfidenceLevelSchema,
    reason_code: ReasonCodeSchema,
    /** Short excerpt from the document, null when nothing was found */
    evidence_snippet: z.string().max(120).nullable()
  });

export type ReasonedValue = {
  value: unknown;
  confidence: ConfidenceLevel;
  reason_code: ReasonCode;
  evidence_snippet: string | null;
};

function scalarSchema(type: ScalarType, description?: string): z.ZodTypeAny {
  const base =
    type === 'number'
      ? z.number()
      : type === 'boolean'
        ? z.boolean()
        : type === 'date'
          ? z.string().describe('ISO 8601 date, YYYY-MM-DD')
          : z.string();
  const nullable = base.nullable();
  return description ? nullable.describe(description) : nullable;
}

function valueSchema(field: FieldSpec): z.ZodTypeAny {
  if (field.type === 'table') {
    const row: Record<string, z.ZodTypeAny> = {};
    for (const column of field.columns ?? []) row[column.key] = scalarSchema(column.type, column.description);
    const rows = z.array(z.object(row)).nullable();
    return field.description ? rows.describe(field.description) : rows;
  }
  return scalarSchema(field.type, field.description);
}

/**
 * Zod schema for the model output of a spec: one reasoned entry per field key.
 */
export function buildRecordSchema(spec: DocumentSpec): z.ZodType<Record<string, ReasonedValue>> {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const field of spec.fields) shape[field.key] = ReasonedField(valueSchema(field));
  return z.object(shape).transform((record) => {
    const out: Record<string, ReasonedValue> = {};
    for (const field of spec.fields) {
      const entry = ReasonedField(z.unknown()).safeParse(record[field.key]);
      if (entry.success) {
        out[field.key] = {
          value: entry.data.value,
          confidence: entry.data.confidence,
          reason_code: entry.data.reason_code,
          evidence_snippet: entry.data.evidence_snippet
        };
      }
    }
    return out;
  });
}
