import { describe, it, expect } from 'vitest';
import { RenderError } from '@docpipe/shared';
import type { Renderer } from '../collaborators';
import type { QueueMessage, JobMessage } from '../queue/types';
import { PDF_BYTES, SPEC_REF, TEMPLATE_REF, ScriptedRenderer, createHarness, type Harness } from '../testing/harness';

const upload = { owner: 'key-1', document: PDF_BYTES, specRef: SPEC_REF, templateRef: TEMPLATE_REF };

const message = (jobId: string, deliveryCount = 1): QueueMessage<JobMessage> => ({
  id: 'msg-2',
  body: { jobId },
  deliveryCount,
  enqueuedAt: new Date('2025-03-01T12:00:00.000Z')
});

/** Submit and run extraction, leaving one generation message queued. */
async function extracted(h: Harness): Promise<string> {
  const { jobId } = await h.pipeline.submit(upload);
  await h.stepExtraction();
  return jobId;
}

describe('generation stage', () => {
  it('renders the record into the template and completes the job', async () => {
    const renderer = new ScriptedRenderer([PDF_BYTES]);
    const h = createHarness({ renderer });
    const jobId = await extracted(h);

    await expect(h.pipeline.handleGeneration(message(jobId))).resolves.toEqual({ action: 'ack' });

    expect(renderer.requests[0]?.record).toEqual({ tenant: 'Acme Ltd' });
    expect(new TextDecoder().decode(renderer.requests[0]?.template)).toBe('{"title":"Lease","sections":[]}');
    const job = await h.store.get(jobId);
    expect(job.stage).toBe('COMPLETE');
    expect(job.outputRef).toMatch(/^jobs\/job-1\/output\//);
    expect(await h.artifacts.get(job.outputRef ?? '')).toEqual(PDF_BYTES);
  });

  it('discards messages for jobs that have not been extracted', async () => {
    const renderer = new ScriptedRenderer([PDF_BYTES]);
    const h = createHarness({ renderer });
    const { jobId } = await h.pipeline.submit(upload);

    await expect(h.pipeline.handleGeneration(message(jobId))).resolves.toEqual({ action: 'ack' });
    expect((await h.store.get(jobId)).stage).toBe('QUEUED');
    expect(renderer.requests).toEqual([]);
  });

  it('acknowledges a redelivery after completion without rendering again', async () => {
    const renderer = new ScriptedRenderer([PDF_BYTES]);
    const h = createHarness({ renderer });
    const jobId = await extracted(h);
    await h.pipeline.handleGeneration(message(jobId));

    await expect(h.pipeline.handleGeneration(message(jobId, 2))).resolves.toEqual({ action: 'ack' });
    expect(renderer.requests).toHaveLength(1);
    expect(h.artifacts.writes).toBe(3);
  });

  it('rolls back to EXTRACTED and keeps the record on a failed attempt', async () => {
    const renderer = new ScriptedRenderer([new RenderError({ message: 'font missing', kind: 'transient' })]);
    const h = createHarness({ renderer });
    const jobId = await extracted(h);
    const before = await h.store.get(jobId);

    await expect(h.pipeline.handleGeneration(message(jobId))).resolves.toEqual({ action: 'release', delayMs: 100 });

    const job = await h.store.get(jobId);
    expect(job.stage).toBe('EXTRACTED');
    expect(job.structuredDataRef).toBe(before.structuredDataRef);
    expect(job.attempts.generation).toBe(1);
    expect(job.lastError).toBe('RENDER_FAILED: font missing');
  });

  it('fails the job at once on an unreadable record when short-circuiting', async () => {
    const renderer = new ScriptedRenderer([PDF_BYTES]);
    const h = createHarness({ renderer, config: { shortCircuitPermanentErrors: true } });
    const jobId = await extracted(h);
    const { structuredDataRef } = await h.store.get(jobId);
    h.artifacts.seed(structuredDataRef ?? '', new TextEncoder().encode('not json'), 'application/json');

    await expect(h.pipeline.handleGeneration(message(jobId))).resolves.toEqual({ action: 'ack' });

    const job = await h.store.get(jobId);
    expect(job.stage).toBe('FAILED');
    expect(job.lastError).toBe('RENDER_FAILED: Structured record is not valid JSON');
    expect(job.structuredDataRef).toBeNull();
    expect(renderer.requests).toEqual([]);
  });

  it('rejects a record that is not a JSON object', async () => {
    const renderer = new ScriptedRenderer([PDF_BYTES]);
    const h = createHarness({ renderer, config: { shortCircuitPermanentErrors: true } });
    const jobId = await extracted(h);
    const { structuredDataRef } = await h.store.get(jobId);
    h.artifacts.seed(structuredDataRef ?? '', new TextEncoder().encode('[1,2,3]'), 'application/json');

    await h.pipeline.handleGeneration(message(jobId));

    expect((await h.store.get(jobId)).lastError).toBe('RENDER_FAILED: Structured record is not a JSON object');
  });

  it('deletes its output when the job was cancelled during rendering', async () => {
    const h: Harness = createHarness({
      renderer: {
        async render(request) {
          await h.pipeline.cancel(request.jobId);
          return PDF_BYTES;
        }
      } satisfies Renderer
    });
    const jobId = await extracted(h);

    await expect(h.pipeline.handleGeneration(message(jobId))).resolves.toEqual({ action: 'ack' });

    const job = await h.store.get(jobId);
    expect(job.stage).toBe('CANCELLED');
    expect(job.outputRef).toBeNull();
    expect(h.artifacts.refs().filter((ref) => ref.includes('/output/'))).toEqual([]);
  });

  it('rolls back an abandoned render claim', async () => {
    const h = createHarness();
    const jobId = await extracted(h);
    await h.store.transition(jobId, 'EXTRACTED', 'GENERATING');
    await h.store.incrementAttempt(jobId, 'generation');
    h.clock.advance(5_000);

    await expect(h.pipeline.handleGeneration(message(jobId, 2))).resolves.toEqual({ action: 'release', delayMs: 0 });

    const job = await h.store.get(jobId);
    expect(job.stage).toBe('EXTRACTED');
    expect(job.lastError).toBe('Abandoned generation attempt 1');
  });
});
