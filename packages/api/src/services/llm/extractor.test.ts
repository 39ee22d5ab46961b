import { afterEach, describe, expect, it, vi } from 'vitest';
import { APICallError } from 'ai';
import { ExtractionError } from '@docpipe/shared';
import { __resetAiFns, __setAiFns, type GenerateObjectRequest } from './client';
import { LlmExtractor } from './extractor';

const env = {
  AZURE_RESOURCE_NAME: 'test-resource',
  AZURE_OPENAI_API_KEY: 'test-key',
  AZURE_OPENAI_DEPLOYMENT: 'gpt-4o-mini'
};

const encode = (value: unknown) => new TextEncoder().encode(typeof value === 'string' ? value : JSON.stringify(value));

const PDF = encode('%PDF-1.7\n%test\n');

const leaseSpec = encode({
  name: 'lease',
  fields: [
    { key: 'tenant', type: 'string', required: true },
    { key: 'rent', type: 'number', required: true },
    { key: 'pets', type: 'boolean' }
  ]
});

const modelOutput = {
  tenant: { value: ' Acme Ltd ', confidence: 'high', reason_code: 'explicit_label', evidence_snippet: 'Tenant: Acme Ltd' },
  rent: { value: 1200, confidence: 'medium', reason_code: 'inferred_layout', evidence_snippet: null },
  pets: { value: null, confidence: 'low', reason_code: 'missing', evidence_snippet: null }
};

const request = (spec: Uint8Array) => ({ jobId: 'job-1', document: PDF, spec, signal: new AbortController().signal });

describe('LlmExtractor', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    __resetAiFns();
  });

  it('builds a scored record from the model output', async () => {
    const spy = vi.fn(async (_request: GenerateObjectRequest) => ({
      object: modelOutput,
      usage: { promptTokens: 300, completionTokens: 21, totalTokens: 321 }
    }));
    __setAiFns({ generateObject: spy });
    const extractor = new LlmExtractor({ env });

    const record = await extractor.extract(request(leaseSpec));

    expect(record).toEqual({
      spec: 'lease',
      data: { tenant: 'Acme Ltd', rent: 1200, pets: null },
      fields: {
        tenant: { confidence: 0.945, reason_code: 'explicit_label', evidence: 'Tenant: Acme Ltd' },
        rent: { confidence: 0.54, reason_code: 'inferred_layout', evidence: null },
        pets: { confidence: 0, reason_code: 'missing', evidence: null }
      },
      confidence: 0.675,
      tokens_used: 321
    });
  });

  it('sends the PDF as a file part', async () => {
    const spy = vi.fn(async (_request: GenerateObjectRequest) => ({ object: modelOutput }));
    __setAiFns({ generateObject: spy });

    await new LlmExtractor({ env }).extract(request(leaseSpec));

    const user = spy.mock.calls[0]?.[0].messages[1];
    expect(user?.role).toBe('user');
    expect(user?.content).toContainEqual({ type: 'file', data: PDF, mimeType: 'application/pdf' });
  });

  it('rejects an invalid spec as a permanent failure', async () => {
    const spy = vi.fn(async () => ({ object: modelOutput }));
    __setAiFns({ generateObject: spy });

    const err = await new LlmExtractor({ env })
      .extract(request(encode({ name: 'rows', fields: [{ key: 'rows', type: 'table' }] })))
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ExtractionError);
    expect(err).toMatchObject({
      kind: 'permanent',
      category: 'INVALID_SPEC',
      message: 'Invalid document spec: fields.0.columns: table fields need columns'
    });
    expect(spy).not.toHaveBeenCalled();
  });

  it('rejects a spec that is not JSON', async () => {
    await expect(new LlmExtractor({ env }).extract(request(encode('not json')))).rejects.toThrow(
      'Invalid document spec: spec is not valid JSON'
    );
  });

  it('reports exhausted quota as transient', async () => {
    __setAiFns({
      generateObject: async () => {
        throw Object.assign(new Error('rate limit'), { status: 429 });
      }
    });

    const err = await new LlmExtractor({ env, maxRetries: 0 }).extract(request(leaseSpec)).catch((e: unknown) => e);

    expect(err).toMatchObject({ kind: 'transient', category: 'QUOTA', retryable: true, message: 'rate limit' });
  });

  it('reports rejected credentials as permanent', async () => {
    __setAiFns({
      generateObject: async () => {
        throw new APICallError({ message: 'Access denied', url: 'https://test', requestBodyValues: {}, statusCode: 403 });
      }
    });

    const err = await new LlmExtractor({ env }).extract(request(leaseSpec)).catch((e: unknown) => e);

    expect(err).toMatchObject({ kind: 'permanent', category: 'AUTH', retryable: false });
  });
});
