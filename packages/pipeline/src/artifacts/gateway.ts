import { randomUUID } from 'node:crypto';
import { ArtifactNotFoundError, StorageUnavailableError } from '@docpipe/shared';

export type ArtifactKind = 'input' | 'structured' | 'output';

export interface PutArtifactOptions {
  /** Key prefix, see `jobScope` / `uploadScope` */
  scope: string;
  kind: ArtifactKind;
  contentType: string;
}

/**
 * Blob storage for documents, structured records and rendered output.
 *
 * Every `put` writes under a fresh unique key, so two workers racing on the
 * same job never overwrite each other; the loser deletes what it wrote.
 *
 * Errors:
 * - StorageUnavailableError: the backend could not be reached (retryable)
 * - ArtifactNotFoundError: `get` of a reference that does not exist
 */
export interface ArtifactGateway {
  put(bytes: Uint8Array, options: PutArtifactOptions): Promise<string>;
  get(ref: string): Promise<Uint8Array>;
  /** Idempotent; deleting a missing reference succeeds. */
  delete(ref: string): Promise<void>;
}

export const jobScope = (jobId: string) => `jobs/${jobId}`;
export const uploadScope = (owner: string) => `uploads/${owner}`;

export function artifactRef(options: Pick<PutArtifactOptions, 'scope' | 'kind'>, suffix: string = randomUUID()): string {
  return `${options.scope}/${options.kind}/${suffix}`;
}

interface StoredArtifact {
  bytes: Uint8Array;
  contentType: string;
}

/** Map-backed gateway for tests and single-process runs. */
export class InMemoryArtifactGateway implements ArtifactGateway {
  private readonly objects = new Map<string, StoredArtifact>();
  private unavailable: Error | null = null;
  private putCount = 0;

  /** Make every call fail with StorageUnavailableError until cleared with `null`. */
  setUnavailable(cause: Error | null): void {
    this.unavailable = cause;
  }

  /** Successful writes so far. */
  get writes(): number {
    return this.putCount;
  }

  /** Seed an object under a fixed reference. */
  seed(ref: string, bytes: Uint8Array, contentType = 'application/octet-stream'): void {
    this.objects.set(ref, { bytes: new Uint8Array(bytes), contentType });
  }

  has(ref: string): boolean {
    return this.objects.has(ref);
  }

  refs(): string[] {
    return [...this.objects.keys()];
  }

  contentType(ref: string): string | undefined {
    return this.objects.get(ref)?.contentType;
  }

  async put(bytes: Uint8Array, options: PutArtifactOptions): Promise<string> {
    await this.ready('put');
    const ref = artifactRef(options);
    this.objects.set(ref, { bytes: new Uint8Array(bytes), contentType: options.contentType });
    this.putCount += 1;
    return ref;
  }

  async get(ref: string): Promise<Uint8Array> {
    await this.ready('get');
    const stored = this.objects.get(ref);
    if (!stored) throw new ArtifactNotFoundError(ref);
    return new Uint8Array(stored.bytes);
  }

  async delete(ref: string): Promise<void> {
    await this.ready('delete');
    this.objects.delete(ref);
  }

  private async ready(operation: string): Promise<void> {
    await Promise.resolve();
    if (this.unavailable) {
      throw new StorageUnavailableError(`Artifact ${operation} failed`, this.unavailable);
    }
  }
}
