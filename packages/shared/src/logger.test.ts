import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from './logger';
import { NotFoundError } from './errors';

describe('createLogger', () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
    vi.spyOn(console, 'log').mockImplementation((line: string) => {
      lines.push(line);
    });
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2025-03-01T12:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('writes one JSON object per line with base and call fields', () => {
    const log = createLogger('extraction', { workerId: 'w-1' });
    log.info('job_transition', { jobId: 'j-1', from: 'QUEUED', to: 'EXTRACTING', skipped: undefined });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toEqual({
      timestamp: '2025-03-01T12:00:00.000Z',
      level: 'info',
      component: 'extraction',
      event: 'job_transition',
      workerId: 'w-1',
      jobId: 'j-1',
      from: 'QUEUED',
      to: 'EXTRACTING'
    });
  });

  it('serializes errors through their JSON form', () => {
    createLogger('store').error('lookup_failed', { error: new NotFoundError('j-9') });
    expect(JSON.parse(lines[0] ?? '').error).toEqual({
      name: 'NotFoundError',
      message: 'Job j-9 not found',
      code: 'NOT_FOUND',
      retryable: false,
      jobId: 'j-9'
    });
  });

  it('drops debug lines unless LOG_LEVEL=debug', () => {
    vi.stubEnv('LOG_LEVEL', 'info');
    const log = createLogger('queue');
    log.debug('poll');
    expect(lines).toHaveLength(0);

    vi.stubEnv('LOG_LEVEL', 'debug');
    log.debug('poll');
    expect(lines).toHaveLength(1);
  });

  it('merges child fields', () => {
    createLogger('bus', { a: 1 }).child({ b: 2 }).warn('slow_subscriber');
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ component: 'bus', a: 1, b: 2, level: 'warn' });
  });

  it('still writes a line when a field cannot be serialized', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic['self'] = cyclic;
    createLogger('bus').info('payload', { cyclic });
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ event: 'payload', component: 'bus' });
  });
});
