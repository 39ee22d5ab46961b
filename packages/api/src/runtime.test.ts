import { describe, it, expect } from 'vitest';
import { DEFAULT_LLM_MAX_RETRIES } from './services/llm/client';
import { llmAttemptTimeoutMs, readLlmMaxRetries, readQueueUrls } from './runtime';

describe('llmAttemptTimeoutMs', () => {
  it('splits the stage timeout across the first call and its retries', () => {
    expect(llmAttemptTimeoutMs(300_000, 2)).toBe(100_000);
    expect(llmAttemptTimeoutMs(300_000, 0)).toBe(300_000);
    expect(llmAttemptTimeoutMs(1_000, 2)).toBe(333);
  });

  it('leaves room for every retry inside the stage timeout', () => {
    const retries = 3;
    expect(llmAttemptTimeoutMs(90_000, retries) * (retries + 1)).toBeLessThanOrEqual(90_000);
  });

  it('never returns zero', () => {
    expect(llmAttemptTimeoutMs(1, 5)).toBe(1);
  });
});

describe('readLlmMaxRetries', () => {
  it('reads a non-negative integer', () => {
    expect(readLlmMaxRetries({ LLM_MAX_RETRIES: '0' })).toBe(0);
    expect(readLlmMaxRetries({ LLM_MAX_RETRIES: ' 4 ' })).toBe(4);
  });

  it('falls back to the client default when unset or invalid', () => {
    expect(readLlmMaxRetries({})).toBe(DEFAULT_LLM_MAX_RETRIES);
    expect(readLlmMaxRetries({ LLM_MAX_RETRIES: '' })).toBe(DEFAULT_LLM_MAX_RETRIES);
    expect(readLlmMaxRetries({ LLM_MAX_RETRIES: '-1' })).toBe(DEFAULT_LLM_MAX_RETRIES);
    expect(readLlmMaxRetries({ LLM_MAX_RETRIES: '1.5' })).toBe(DEFAULT_LLM_MAX_RETRIES);
  });
});

describe('readQueueUrls', () => {
  const env = {
    EXTRACTION_QUEUE_URL: 'https://sqs.test/extraction',
    EXTRACTION_DLQ_URL: 'https://sqs.test/extraction-dlq',
    GENERATION_QUEUE_URL: 'https://sqs.test/generation',
    GENERATION_DLQ_URL: 'https://sqs.test/generation-dlq'
  };

  it('pairs each queue with its dead-letter queue', () => {
    expect(readQueueUrls(env)).toEqual({
      extraction: { queueUrl: 'https://sqs.test/extraction', deadLetterQueueUrl: 'https://sqs.test/extraction-dlq' },
      generation: { queueUrl: 'https://sqs.test/generation', deadLetterQueueUrl: 'https://sqs.test/generation-dlq' }
    });
  });

  it('returns null unless all four are set', () => {
    expect(readQueueUrls({ ...env, GENERATION_DLQ_URL: ' ' })).toBeNull();
  });
});
