/**
 * AI-backed Extractor for the extraction stage.
 *
 * Turns the uploaded PDF and a document spec into a structured record:
 *
 * ```json
 * {
 *   "spec": "lease",
 *   "data": { "tenant": "Acme Ltd", "rent": 1200 },
 *   "fields": { "tenant": { "confidence": 0.945, "reason_code": "explicit_label", "evidence": "Tenant: Acme Ltd" } },
 *   "confidence": 0.91,
 *   "tokens_used": 1834
 * }
 * ```
 *
 * Failure kinds: an invalid spec, an auth or validation error and a schema
 * mismatch are permanent; quota, timeout and server errors are transient.
 */

import { ExtractionError, createLogger, type Logger } from '@docpipe/shared';
import type { ExtractionRequest, Extractor, StructuredRecord } from '@docpipe/pipeline';
import { callLlm, isTransientCategory } from './client';
import { calculateWeightedConfidence, type ConfidenceWeights } from './confidence';
import { buildExtractionPrompt } from './prompts/extraction';
import { buildRecordSchema, parseDocumentSpec, type DocumentSpec, type ReasonedValue } from './schemas/document-spec';

export interface LlmExtractorOptions {
  /** Per-attempt model timeout (default: 30s) */
  timeoutMs?: number;
  /** In-call retries for transient errors (default: 2) */
  maxRetries?: number;
  retryDelaysMs?: number[];
  confidenceWeights?: ConfidenceWeights;
  env?: Record<string, string | undefined>;
  logger?: Logger;
}

function normalizeValue(value: unknown): unknown {
  if (typeof value === 'string') return value.trim();
  if (Array.isArray(value)) return value.map(normalizeValue);
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) out[key] = normalizeValue(inner);
    return out;
  }
  return value;
}

/** Assemble the stored record from the model output. */
export function buildStructuredRecord(
  spec: DocumentSpec,
  fields: Record<string, ReasonedValue>,
  tokensUsed: number | undefined,
  weights?: ConfidenceWeights
): StructuredRecord {
  const confidence = calculateWeightedConfidence(spec, fields, weights);
  const data: Record<string, unknown> = {};
  const details: Record<string, unknown> = {};
  for (const field of spec.fields) {
    const entry = fields[field.key];
    data[field.key] = entry === undefined ? null : normalizeValue(entry.value);
    details[field.key] = {
      confidence: confidence.perField[field.key] ?? 0,
      reason_code: entry?.reason_code ?? 'missing',
      evidence: entry?.evidence_snippet?.trim() || null
    };
  }
  return {
    spec: spec.name,
    data,
    fields: details,
    confidence: confidence.overall,
    tokens_used: tokensUsed ?? null
  };
}

export class LlmExtractor implements Extractor {
  private readonly log: Logger;

  constructor(private readonly options: LlmExtractorOptions = {}) {
    this.log = options.logger ?? createLogger('llm-extractor');
  }

  async extract(request: ExtractionRequest): Promise<StructuredRecord> {
    const parsed = parseDocumentSpec(request.spec);
    if (!parsed.success) {
      throw new ExtractionError({
        message: `Invalid document spec: ${parsed.issues.join('; ')}`,
        kind: 'permanent',
        category: 'INVALID_SPEC'
      });
    }
    const spec = parsed.spec;

    const result = await callLlm({
      messages: buildExtractionPrompt(spec, request.document),
      schema: buildRecordSchema(spec),
      signal: request.signal,
      generationName: 'field-extraction',
      metadata: { jobId: request.jobId, spec: spec.name, fieldCount: spec.fields.length },
      ...(this.options.timeoutMs !== undefined ? { timeoutMs: this.options.timeoutMs } : {}),
      ...(this.options.maxRetries !== undefined ? { maxRetries: this.options.maxRetries } : {}),
      ...(this.options.retryDelaysMs ? { retryDelaysMs: this.options.retryDelaysMs } : {}),
      ...(this.options.env ? { env: this.options.env } : {})
    });

    if (!result.success) {
      const { error } = result;
      throw new ExtractionError({
        message: error.message,
        kind: isTransientCategory(error.category) ? 'transient' : 'permanent',
        category: error.category,
        cause: error
      });
    }

    const record = buildStructuredRecord(spec, result.data, result.usage?.totalTokens, this.options.confidenceWeights);
    this.log.info('extraction_complete', {
      jobId: request.jobId,
      spec: spec.name,
      confidence: record['confidence'],
      tokens: result.usage?.totalTokens,
      attempts: result.attempts,
      durationMs: result.durationMs
    });
    return record;
  }
}
