/**
 * External services the stages call. Implementations live in the api package
 * (AI extraction, PDF rendering); tests pass scripted fakes.
 *
 * Both calls receive an AbortSignal that fires when the per-call timeout
 * expires. Failures should be ExtractionError / RenderError with a `kind`;
 * anything else is treated as transient.
 */

/** Structured output of extraction, stored as JSON. */
export type StructuredRecord = Record<string, unknown>;

export interface ExtractionRequest {
  jobId: string;
  /** Uploaded PDF */
  document: Uint8Array;
  /** Raw field specification (JSON) */
  spec: Uint8Array;
  signal: AbortSignal;
}

export interface Extractor {
  extract(request: ExtractionRequest): Promise<StructuredRecord>;
}

export interface RenderRequest {
  jobId: string;
  /** Raw layout template (JSON) */
  template: Uint8Array;
  record: StructuredRecord;
  signal: AbortSignal;
}

export interface Renderer {
  render(request: RenderRequest): Promise<Uint8Array>;
}
