/**
 * Cross-process status fanout over Postgres LISTEN/NOTIFY.
 *
 * Local publishes are forwarded with pg_notify on a shared channel; payloads
 * from other processes are parsed and published into the local bus marked as
 * relayed, so they are never forwarded again. Each relay tags its payloads
 * with a random origin and skips its own notifications.
 *
 * A connection error drops the client and opens a new one after
 * `reconnectDelayMs`. Notifications sent while disconnected are lost, so
 * `onReconnect` is awaited once LISTEN is back (see `resyncWatchers`).
 */

import { randomUUID } from 'node:crypto';
import type { Client, Notification } from 'pg';
import { z } from 'zod';
import { ConfigError, createLogger, parseStatusEvent, type Logger, type StatusEvent } from '@docpipe/shared';
import type { StatusBus } from './status-bus';

export type RelayClient = Pick<Client, 'connect' | 'query' | 'on' | 'end'>;

export interface PgStatusRelayOptions {
  bus: StatusBus;
  /** Opens a dedicated connection; LISTEN needs one that is not returned to a pool */
  createClient: () => RelayClient;
  /** Also publish other processes' events locally; false forwards only */
  listen?: boolean;
  channel?: string;
  reconnectDelayMs?: number;
  /** Runs after a reconnect, once LISTEN is re-established */
  onReconnect?: () => Promise<void>;
  logger?: Logger;
}

const envelopeSchema = z.object({ origin: z.string(), event: z.unknown() });

const CHANNEL_PATTERN = /^[a-z_][a-z0-9_]*$/;

/** NOTIFY payloads are capped at 8000 bytes; this leaves room for the envelope even at 4 bytes per character. */
export const MAX_RELAYED_ERROR_LENGTH = 1_000;

export function encodeEnvelope(origin: string, event: StatusEvent): string {
  const { error, ...rest } = event;
  const clipped =
    typeof error !== 'string' || error.length <= MAX_RELAYED_ERROR_LENGTH
      ? event
      : { ...rest, error: `${error.slice(0, MAX_RELAYED_ERROR_LENGTH - 1)}…` };
  return JSON.stringify({ origin, event: clipped });
}

export class PgStatusRelay {
  readonly origin = randomUUID();
  private readonly channel: string;
  private readonly listen: boolean;
  private readonly reconnectDelayMs: number;
  private readonly log: Logger;
  private client: RelayClient | null = null;
  private unsubscribe: (() => void) | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly options: PgStatusRelayOptions) {
    this.channel = options.channel ?? 'docpipe_status';
    if (!CHANNEL_PATTERN.test(this.channel)) {
      throw new ConfigError([`status channel "${this.channel}" is not a valid identifier`]);
    }
    this.listen = options.listen ?? true;
    this.reconnectDelayMs = options.reconnectDelayMs ?? 1_000;
    this.log = options.logger ?? createLogger('status-relay', { channel: this.channel });
  }

  get connected(): boolean {
    return this.client !== null;
  }

  async start(): Promise<void> {
    if (this.unsubscribe) return;
    this.client = await this.connect();
    this.unsubscribe = this.options.bus.onPublish((event, source) => {
      if (source === 'relay') return;
      this.track(this.forward(event));
    });
    this.log.info('relay_started', { origin: this.origin, listen: this.listen });
  }

  /** Wait for every forward issued so far. Never rejects. */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  async stop(): Promise<void> {
    if (!this.unsubscribe) return;
    this.unsubscribe();
    this.unsubscribe = null;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    await this.flush();
    const client = this.client;
    this.client = null;
    if (client) {
      if (this.listen) await client.query(`UNLISTEN ${this.channel}`);
      await client.end();
    }
    this.log.info('relay_stopped');
  }

  private async connect(): Promise<RelayClient> {
    const client = this.options.createClient();
    client.on('error', (err: Error) => this.handleConnectionError(client, err));
    if (this.listen) client.on('notification', this.handleNotification);
    try {
      await client.connect();
      if (this.listen) await client.query(`LISTEN ${this.channel}`);
    } catch (err) {
      this.close(client);
      throw err;
    }
    return client;
  }

  private handleConnectionError(client: RelayClient, err: Error): void {
    if (client !== this.client) return;
    this.log.error('relay_connection_error', { error: err, decision: 'reconnect' });
    this.client = null;
    this.close(client);
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (!this.unsubscribe || this.reconnectTimer) return;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.track(this.reconnect());
    }, this.reconnectDelayMs);
  }

  private async reconnect(): Promise<void> {
    let client: RelayClient;
    try {
      client = await this.connect();
    } catch (err) {
      this.log.error('relay_reconnect_failed', { error: err });
      this.scheduleReconnect();
      return;
    }
    if (!this.unsubscribe) {
      this.close(client);
      return;
    }
    this.client = client;
    this.log.info('relay_reconnected');
    await this.options.onReconnect?.();
  }

  private close(client: RelayClient): void {
    client.end().catch((err: unknown) => {
      this.log.debug('relay_close_failed', { error: err });
    });
  }

  private track(work: Promise<void>): void {
    const tracked = work
      .catch((err: unknown) => {
        this.log.warn('relay_task_failed', { error: err });
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  private async forward(event: StatusEvent): Promise<void> {
    const client = this.client;
    if (!client) {
      this.log.warn('relay_forward_skipped', { jobId: event.jobId, stage: event.stage, reason: 'disconnected' });
      return;
    }
    await client.query('SELECT pg_notify($1, $2)', [this.channel, encodeEnvelope(this.origin, event)]);
  }

  private readonly handleNotification = (message: Notification) => {
    if (message.channel !== this.channel || !message.payload) return;

    let raw: unknown;
    try {
      raw = JSON.parse(message.payload);
    } catch (err) {
      this.log.warn('relay_payload_unparseable', { error: err });
      return;
    }
    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success) {
      this.log.warn('relay_payload_invalid');
      return;
    }
    if (envelope.data.origin === this.origin) return;

    const event = parseStatusEvent(envelope.data.event);
    if (!event) {
      this.log.warn('relay_payload_invalid', { origin: envelope.data.origin });
      return;
    }
    this.options.bus.publish(event, 'relay');
  };
}
