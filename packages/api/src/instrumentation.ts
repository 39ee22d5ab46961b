import { Langfuse } from 'langfuse';
import { createLogger } from '@docpipe/shared';

const log = createLogger('instrumentation');

const langfusePublicKey = process.env['LANGFUSE_PUBLIC_KEY'];
const langfuseSecretKey = process.env['LANGFUSE_SECRET_KEY'];
const langfuseHost = process.env['LANGFUSE_HOST']; // Optional, defaults to cloud.langfuse.com

let langfuse: Langfuse | null = null;

if (langfusePublicKey && langfuseSecretKey) {
  langfuse = new Langfuse({
    publicKey: langfusePublicKey,
    secretKey: langfuseSecretKey,
    // Send each generation as soon as it ends; workers can be stopped at any time
    flushAt: 1,
    flushInterval: 100,
    requestTimeout: 5000,
    // Only pass baseUrl when set; Langfuse defaults to its cloud host
    ...(langfuseHost ? { baseUrl: langfuseHost } : {})
  });
} else {
  log.warn('langfuse_disabled', { reason: 'LANGFUSE_PUBLIC_KEY or LANGFUSE_SECRET_KEY not set' });
}

export { langfuse };

/** Flush and close the client on worker shutdown. */
export async function shutdown(): Promise<void> {
  if (langfuse) {
    await langfuse.shutdownAsync();
  }
}
