/**
 * @fileoverview LLM Client Service
 *
 * Azure OpenAI access through the AI SDK `createAzure` provider. `callLlm`
 * runs one structured generation against a Zod schema with a per-attempt
 * timeout, JSON repair, categorized errors and bounded retries for the
 * transient categories (QUOTA, TIMEOUT, SERVER).
 *
 * Every call is traced to Langfuse when it is configured. PDF bytes in the
 * prompt are summarized in traces and logs, never sent as-is.
 */

import { z } from 'zod';
import { createAzure } from '@ai-sdk/azure';
import {
  APICallError,
  generateObject,
  NoObjectGeneratedError,
  type CoreMessage,
  type LanguageModel,
  type LanguageModelUsage,
  type RepairTextFunction
} from 'ai';
import { jsonrepair } from 'jsonrepair';
import { createLogger } from '@docpipe/shared';

import { langfuse } from '../../instrumentation';

const log = createLogger('llm-client');

/**
 * Categories of LLM errors. QUOTA, TIMEOUT and SERVER are transient and
 * retried; the rest fail the call at once.
 */
export type LlmErrorCategory =
  | 'VALIDATION'
  | 'AUTH'
  | 'QUOTA'
  | 'TIMEOUT'
  | 'SERVER'
  | 'FAILED_STATUS'
  | 'SCHEMA_VALIDATION';

export class LlmError extends Error {
  category: LlmErrorCategory;
  /** HTTP status code if applicable */
  statusCode?: number;
  provider?: string;
  /** Request ID for tracing */
  requestId?: string | null;
  /** Original error message from underlying cause */
  causeMessage?: string;

  constructor(options: {
    message: string;
    category: LlmErrorCategory;
    statusCode?: number;
    provider?: string;
    requestId?: string | null;
    cause?: unknown;
  }) {
    super(options.message);
    this.name = 'LlmError';
    this.category = options.category;
    if (options.statusCode !== undefined) this.statusCode = options.statusCode;
    if (options.provider !== undefined) this.provider = options.provider;
    if (options.requestId !== undefined) this.requestId = options.requestId;
    const cm = options.cause instanceof Error ? options.cause.message : undefined;
    if (cm !== undefined) this.causeMessage = cm;
  }

  toJSON() {
    return {
      name: 'LlmError',
      message: this.message,
      category: this.category,
      statusCode: this.statusCode,
      provider: this.provider,
      requestId: this.requestId
    } as const;
  }
}

export function isTransientCategory(category: LlmErrorCategory): boolean {
  return category === 'QUOTA' || category === 'TIMEOUT' || category === 'SERVER';
}

/** Azure OpenAI deployment settings. */
export interface LlmClientConfig {
  deployment: string;
  resourceName: string;
  apiKey: string;
  apiVersion: string;
}

const PROVIDER = 'azure_openai';
const MAX_OUTPUT_TOKENS = 4096;
/** In-call retries after the first attempt when the caller sets none */
export const DEFAULT_LLM_MAX_RETRIES = 2;

const DEFAULT_RETRY_DELAYS_MS = [500, 1000, 2000, 4000, 4000];

/**
 * Read a required, non-blank environment variable.
 *
 * @throws {LlmError} VALIDATION when missing
 */
export function getRequiredEnv(name: string, env: Record<string, string | undefined> = process.env): string {
  const v = env[name];
  if (!v || v.trim().length === 0) {
    throw new LlmError({ message: `Missing required env: ${name}`, category: 'VALIDATION' });
  }
  return v.trim();
}

/**
 * Build the client configuration from AZURE_* variables.
 *
 * @example
 * ```typescript
 * const { modelId, config } = getLlmClient();
 * const model = createAzure(config)(modelId);
 * ```
 */
export function getLlmClient(env: Record<string, string | undefined> = process.env): {
  modelId: string;
  config: LlmClientConfig;
} {
  const resourceName = getRequiredEnv('AZURE_RESOURCE_NAME', env);
  const apiKey = getRequiredEnv('AZURE_OPENAI_API_KEY', env);
  const deployment = getRequiredEnv('AZURE_OPENAI_DEPLOYMENT', env);
  const apiVersion = env['AZURE_OPENAI_API_VERSION']?.trim() || '2024-12-01-preview';
  return { modelId: deployment, config: { deployment, resourceName, apiKey, apiVersion } };
}

function mapStatusToCategory(status: number): LlmErrorCategory {
  if (status === 400 || status === 413 || status === 422) return 'VALIDATION';
  if (status === 401 || status === 403) return 'AUTH';
  if (status === 408) return 'TIMEOUT';
  if (status === 429) return 'QUOTA';
  return 'SERVER';
}

function statusOf(err: object): number | undefined {
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  if ('status' in err && typeof err.status === 'number') return err.status;
  return undefined;
}

function mapError(err: unknown): LlmError {
  if (err instanceof LlmError) return err;
  if (APICallError.isInstance(err) && err.statusCode !== undefined) {
    return new LlmError({
      message: err.message || `HTTP ${err.statusCode}`,
      category: mapStatusToCategory(err.statusCode),
      statusCode: err.statusCode,
      provider: PROVIDER,
      cause: err
    });
  }
  if (err && typeof err === 'object') {
    if (err instanceof Error && err.name === 'AbortError') {
      return new LlmError({ message: 'Timeout/abort', category: 'TIMEOUT', provider: PROVIDER, cause: err });
    }
    const status = statusOf(err);
    if (status !== undefined) {
      const message = err instanceof Error && err.message.length > 0 ? err.message : `HTTP ${status}`;
      return new LlmError({ message, category: mapStatusToCategory(status), statusCode: status, provider: PROVIDER });
    }
  }
  // Status sometimes only survives in the message text
  const message = err instanceof Error ? err.message : 'Unknown LLM error';
  let category: LlmErrorCategory = 'SERVER';
  if (/\b400\b/.test(message)) category = 'VALIDATION';
  else if (/\b(401|403)\b/.test(message)) category = 'AUTH';
  else if (/\b429\b/.test(message)) category = 'QUOTA';
  return new LlmError({ message, category, provider: PROVIDER, cause: err });
}

function jitter(base: number, spread = 200) {
  return base + Math.floor(Math.random() * spread);
}

function clipString(value: string, max = 2000): string {
  return value.length > max ? `${value.slice(0, max)}…` : value;
}

function clipUnknown(value: unknown, max = 2000): string | null {
  if (value === null || value === undefined) return null;
  const str = typeof value === 'string' ? value : JSON.stringify(value);
  return clipString(str, max);
}

/**
 * Repair malformed model JSON (markdown fences, trailing commas, single
 * quotes, unclosed brackets). Returns the input unchanged when jsonrepair
 * gives up, so the schema error surfaces with the original text.
 */
export function repairJsonText(text: string): string {
  if (!text) return text;
  try {
    return jsonrepair(text.trim());
  } catch (err) {
    log.warn('jsonrepair_failed', { error: err, textLength: text.length, textPreview: clipString(text, 500) });
    return text;
  }
}

/** Messages with binary parts replaced by their size, for traces and logs. */
export function describeMessages(messages: CoreMessage[]): unknown[] {
  return messages.map((message) => {
    if (typeof message.content === 'string') return message;
    return {
      role: message.role,
      content: message.content.map((part) =>
        part.type === 'file' && part.data instanceof Uint8Array
          ? { type: 'file', mimeType: part.mimeType, bytes: part.data.byteLength }
          : part
      )
    };
  });
}

export type CallLlmOptions<T> = {
  messages: CoreMessage[];
  /** Zod schema the generated object must satisfy */
  schema: z.ZodType<T>;
  /** Per-attempt timeout in milliseconds (default: 30s) */
  timeoutMs?: number;
  /** Retries after the first attempt, transient categories only (default: DEFAULT_LLM_MAX_RETRIES) */
  maxRetries?: number;
  /** Base delay per retry, jittered (default: 500, 1000, 2000, 4000, 4000) */
  retryDelaysMs?: number[];
  /** Caller cancellation; stops the call without further retries */
  signal?: AbortSignal;
  /** Name for the Langfuse generation span */
  generationName?: string;
  metadata?: Record<string, unknown>;
  env?: Record<string, string | undefined>;
};

export type LlmUsage = { promptTokens?: number; completionTokens?: number; totalTokens?: number };

export type CallLlmResult<T = unknown> =
  | {
      success: true;
      data: T;
      /** Token usage for cost tracking */
      usage?: LlmUsage;
      durationMs: number;
      /** Attempts made, including the successful one */
      attempts: number;
    }
  | {
      success: false;
      error: LlmError;
      durationMs: number;
      attempts: number;
    };

function toUsage(usage: Partial<LanguageModelUsage> | undefined): LlmUsage | undefined {
  if (!usage) return undefined;
  const out: LlmUsage = {};
  if (Number.isFinite(usage.promptTokens)) out.promptTokens = usage.promptTokens;
  if (Number.isFinite(usage.completionTokens)) out.completionTokens = usage.completionTokens;
  if (Number.isFinite(usage.totalTokens)) out.totalTokens = usage.totalTokens;
  return out;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function callLlm<T>(opts: CallLlmOptions<T>): Promise<CallLlmResult<T>> {
  const t0 = Date.now();
  let attempt = 0;

  let modelId: string;
  let model: LanguageModel;
  try {
    const loaded = getLlmClient(opts.env);
    modelId = loaded.modelId;
    model = createAzure({
      resourceName: loaded.config.resourceName,
      apiKey: loaded.config.apiKey,
      apiVersion: loaded.config.apiVersion
    })(modelId);
  } catch (e) {
    const error = e instanceof LlmError ? e : new LlmError({ message: 'LLM config error', category: 'VALIDATION', cause: e });
    return { success: false, error, durationMs: Date.now() - t0, attempts: 0 };
  }

  const timeoutMs = opts.timeoutMs !== undefined && opts.timeoutMs > 0 ? opts.timeoutMs : 30_000;
  const maxRetries = opts.maxRetries !== undefined ? Math.max(0, Math.trunc(opts.maxRetries)) : DEFAULT_LLM_MAX_RETRIES;
  const delays = opts.retryDelaysMs && opts.retryDelaysMs.length > 0 ? opts.retryDelaysMs : DEFAULT_RETRY_DELAYS_MS;

  const generation = langfuse?.generation({
    name: opts.generationName || 'llm-call',
    model: modelId,
    modelParameters: { provider: PROVIDER, maxTokens: MAX_OUTPUT_TOKENS },
    input: describeMessages(opts.messages),
    metadata: { ...opts.metadata, timeoutMs, maxRetries }
  });

  const repairText: RepairTextFunction = async ({ text }) => {
    const repaired = repairJsonText(text);
    log.info('repair_attempt', {
      provider: PROVIDER,
      model: modelId,
      attempt,
      originalTextLength: text.length,
      repairedTextLength: repaired.length,
      repairApplied: repaired !== text
    });
    return repaired;
  };

  const fail = (error: LlmError): CallLlmResult<T> => {
    generation?.end({
      level: 'ERROR',
      statusMessage: `${error.category}: ${error.message}`,
      metadata: { errorCategory: error.category, statusCode: error.statusCode, attemptsMade: attempt + 1 }
    });
    return { success: false, error, durationMs: Date.now() - t0, attempts: attempt + 1 };
  };

  while (true) {
    if (opts.signal?.aborted) {
      return fail(new LlmError({ message: 'Cancelled by caller', category: 'TIMEOUT', provider: PROVIDER }));
    }

    // Each attempt gets its own controller; the caller's signal aborts it too
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new Error('timeout')), timeoutMs);
    const onCallerAbort = () => controller.abort(opts.signal?.reason);
    opts.signal?.addEventListener('abort', onCallerAbort, { once: true });
    const aStart = Date.now();

    try {
      const result = await __aiFns.generateObject({
        model,
        messages: opts.messages,
        schema: opts.schema,
        abortSignal: controller.signal,
        maxTokens: MAX_OUTPUT_TOKENS,
        // Retries are ours, with categorization and jitter
        maxRetries: 0,
        experimental_repairText: repairText
      });

      const parsed = opts.schema.safeParse(result.object);
      if (!parsed.success) {
        throw new LlmError({
          message: `Generated object failed validation: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
          category: 'SCHEMA_VALIDATION',
          provider: PROVIDER
        });
      }

      const usage = toUsage(result.usage);
      generation?.end({ output: parsed.data, ...(usage ? { usage } : {}), statusMessage: 'success' });
      log.info('llm_ok', {
        provider: PROVIDER,
        model: modelId,
        attempt,
        durationMs: Date.now() - aStart,
        tokens: usage?.totalTokens
      });
      return {
        success: true,
        data: parsed.data,
        ...(usage ? { usage } : {}),
        durationMs: Date.now() - t0,
        attempts: attempt + 1
      };
    } catch (caught) {
      if (NoObjectGeneratedError.isInstance(caught)) {
        const cause = caught.cause instanceof Error ? caught.cause.message : String(caught.cause);
        log.warn('no_object_generated', {
          provider: PROVIDER,
          model: modelId,
          attempt,
          text: clipUnknown(caught.text, 5000),
          textLength: caught.text?.length ?? 0,
          responseId: caught.response?.id,
          cause
        });
        // Schema mismatches do not get better on retry
        return fail(
          new LlmError({
            message: `No object generated: response did not match schema. Cause: ${cause}`,
            category: 'SCHEMA_VALIDATION',
            provider: PROVIDER
          })
        );
      }

      const callerAborted = opts.signal?.aborted === true;
      const err = controller.signal.aborted
        ? new LlmError({
            message: callerAborted ? 'Cancelled by caller' : `Timed out after ${timeoutMs}ms`,
            category: 'TIMEOUT',
            provider: PROVIDER,
            cause: caught
          })
        : mapError(caught);
      if (!err.provider) err.provider = PROVIDER;
      log.warn('llm_error', { provider: PROVIDER, model: modelId, attempt, category: err.category, error: err });

      if (!callerAborted && isTransientCategory(err.category) && attempt < maxRetries) {
        const idx = Math.min(attempt, delays.length - 1);
        await sleep(jitter(delays[idx] ?? 0));
        attempt++;
        continue;
      }
      return fail(err);
    } finally {
      clearTimeout(timer);
      opts.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

/** Request shape passed to the AI SDK; narrowed so tests can fake it. */
export interface GenerateObjectRequest {
  model: LanguageModel;
  messages: CoreMessage[];
  schema: z.ZodType<unknown>;
  abortSignal: AbortSignal;
  maxTokens: number;
  maxRetries: number;
  experimental_repairText: RepairTextFunction;
}

type AiFns = {
  generateObject: (request: GenerateObjectRequest) => Promise<{ object: unknown; usage?: Partial<LanguageModelUsage> }>;
};

const defaultAiFns: AiFns = { generateObject: (request) => generateObject(request) };

let __aiFns: AiFns = defaultAiFns;

/** Test seam: override AI SDK bindings without ESM module mocking. */
export function __setAiFns(fns: Partial<AiFns>) {
  __aiFns = { ...__aiFns, ...fns };
}

export function __resetAiFns() {
  __aiFns = defaultAiFns;
}
