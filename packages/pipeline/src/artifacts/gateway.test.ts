import { describe, it, expect } from 'vitest';
import { ArtifactNotFoundError, StorageUnavailableError } from '@docpipe/shared';
import { InMemoryArtifactGateway, artifactRef, jobScope, uploadScope } from './gateway';

const bytes = new TextEncoder().encode('hello');

describe('artifact references', () => {
  it('builds scoped references', () => {
    expect(artifactRef({ scope: jobScope('job-1'), kind: 'output' }, 'abc')).toBe('jobs/job-1/output/abc');
    expect(artifactRef({ scope: uploadScope('key-1'), kind: 'input' }, 'abc')).toBe('uploads/key-1/input/abc');
  });

  it('uses a fresh suffix for every reference', () => {
    const options = { scope: jobScope('job-1'), kind: 'structured' as const };
    expect(artifactRef(options)).not.toBe(artifactRef(options));
  });
});

describe('InMemoryArtifactGateway', () => {
  it('stores a copy under a unique reference and counts writes', async () => {
    const gateway = new InMemoryArtifactGateway();
    const options = { scope: jobScope('job-1'), kind: 'structured' as const, contentType: 'application/json' };

    const first = await gateway.put(bytes, options);
    const second = await gateway.put(bytes, options);

    expect(first).not.toBe(second);
    expect(first.startsWith('jobs/job-1/structured/')).toBe(true);
    expect(gateway.writes).toBe(2);
    expect(gateway.contentType(first)).toBe('application/json');
    expect(new TextDecoder().decode(await gateway.get(first))).toBe('hello');
  });

  it('throws ArtifactNotFoundError for unknown references', async () => {
    await expect(new InMemoryArtifactGateway().get('jobs/x/output/y')).rejects.toBeInstanceOf(ArtifactNotFoundError);
  });

  it('deletes idempotently', async () => {
    const gateway = new InMemoryArtifactGateway();
    gateway.seed('jobs/j/input/doc', bytes);
    await gateway.delete('jobs/j/input/doc');
    await gateway.delete('jobs/j/input/doc');
    expect(gateway.has('jobs/j/input/doc')).toBe(false);
  });

  it('fails every call while unavailable', async () => {
    const gateway = new InMemoryArtifactGateway();
    gateway.setUnavailable(new Error('bucket offline'));

    const err = await gateway
      .put(bytes, { scope: 'jobs/j', kind: 'output', contentType: 'application/pdf' })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StorageUnavailableError);
    expect(gateway.writes).toBe(0);

    gateway.setUnavailable(null);
    await expect(gateway.put(bytes, { scope: 'jobs/j', kind: 'output', contentType: 'application/pdf' })).resolves.toMatch(
      /^jobs\/j\/output\//
    );
  });
});
