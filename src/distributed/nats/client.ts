/**
 * NATS client wrapper for the task broker
 *
 * Provides JSON publish/subscribe with optional queue groups. Payloads are
 * decoded to `unknown`; callers validate them against their own schemas.
 */

import { EventEmitter } from 'eventemitter3';
import {
  connect,
  DebugEvents,
  Events,
  JSONCodec,
  type ConnectionOptions,
  type NatsConnection,
  type Subscription,
} from 'nats';
import type { Logger } from 'pino';
import { createLogger } from '../../utils/logger.js';
import { BrokerError, ConnectionError, toError } from '../../utils/errors.js';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting' | 'closed';

export interface NatsClientOptions {
  url: string;
  user?: string;
  password?: string;
  /** Connection name shown in NATS monitoring */
  name?: string;
  reconnect?: boolean;
  maxReconnectAttempts?: number;
  reconnectTimeWait?: number;
  logger?: Logger;
}

export interface SubscribeOptions {
  /** Queue group; each message goes to one member of the group */
  queue?: string;
}

export interface NatsClientEvents {
  connected: () => void;
  disconnected: () => void;
  error: (error: Error) => void;
}

/**
 * @example
 * ```typescript
 * const client = new NatsClient({ url: 'nats://localhost:4222' });
 * await client.connect();
 * client.subscribe('models.tasks', (data) => handle(data), { queue: 'models-workers' });
 * await client.publish('models.control', { type: 'revoke', taskId });
 * await client.disconnect();
 * ```
 */
export class NatsClient extends EventEmitter<NatsClientEvents> {
  private nc?: NatsConnection;
  private state: ConnectionState = 'disconnected';
  private readonly logger: Logger;
  private readonly jc = JSONCodec<unknown>();

  constructor(private readonly options: NatsClientOptions) {
    super();
    this.logger = options.logger ?? createLogger('NatsClient');
  }

  /**
   * @throws {ConnectionError} if connection fails
   */
  async connect(): Promise<void> {
    if (this.nc) {
      return;
    }

    this.logger.info({ url: this.options.url }, 'Connecting to NATS server');
    this.state = 'connecting';

    try {
      const nc = await connect(this.buildConnectionOptions());
      this.nc = nc;
      this.state = 'connected';
      this.logger.info({ server: nc.getServer() }, 'Connected to NATS server');

      this.watchStatus(nc);
      this.emit('connected');
    } catch (error) {
      this.state = 'disconnected';
      this.logger.error({ err: error }, 'Failed to connect to NATS server');
      throw new ConnectionError(`Failed to connect to NATS: ${toError(error).message}`, toError(error));
    }
  }

  /**
   * Drain subscriptions and close the connection
   */
  async disconnect(): Promise<void> {
    const nc = this.nc;
    if (!nc) {
      this.logger.warn('Disconnect called but not connected');
      return;
    }

    this.logger.info('Disconnecting from NATS server');
    this.nc = undefined;
    await nc.drain();
    this.state = 'closed';
    this.logger.info('Disconnected from NATS server');
    this.emit('disconnected');
  }

  isConnected(): boolean {
    return this.state === 'connected' && this.nc !== undefined;
  }

  getConnectionState(): ConnectionState {
    return this.state;
  }

  /**
   * JSON-encode `data` and publish it, flushing so delivery errors surface
   *
   * @throws {ConnectionError} if not connected
   * @throws {BrokerError} if publish fails
   */
  async publish(subject: string, data: unknown): Promise<void> {
    const nc = this.requireConnection();

    try {
      nc.publish(subject, this.jc.encode(data));
      await nc.flush();
      this.logger.debug({ subject }, 'Message published');
    } catch (error) {
      this.logger.error({ err: error, subject }, 'Failed to publish message');
      throw new BrokerError(`Failed to publish to ${subject}: ${toError(error).message}`, 'BROKER_ERROR', toError(error));
    }
  }

  /**
   * Subscribe to `subject`. Messages are handled one at a time in arrival
   * order; a handler error is logged and does not end the subscription.
   *
   * @throws {ConnectionError} if not connected
   */
  subscribe(
    subject: string,
    callback: (data: unknown) => void | Promise<void>,
    options: SubscribeOptions = {}
  ): Subscription {
    const nc = this.requireConnection();
    const sub = nc.subscribe(subject, options.queue ? { queue: options.queue } : undefined);
    this.logger.info({ subject, queue: options.queue }, 'Subscribed to subject');

    void (async () => {
      try {
        for await (const msg of sub) {
          try {
            await callback(this.jc.decode(msg.data));
          } catch (error) {
            this.logger.error({ err: error, subject }, 'Error processing message');
          }
        }
      } catch (error) {
        this.logger.error({ err: error, subject }, 'Subscription error');
      }
    })();

    return sub;
  }

  private requireConnection(): NatsConnection {
    if (!this.nc) {
      throw new ConnectionError('Not connected to NATS');
    }
    return this.nc;
  }

  private buildConnectionOptions(): ConnectionOptions {
    const connectionOptions: ConnectionOptions = {
      servers: this.options.url,
      name: this.options.name ?? 'models-orchestrator',
      reconnect: this.options.reconnect ?? true,
      maxReconnectAttempts: this.options.maxReconnectAttempts ?? 10,
      reconnectTimeWait: this.options.reconnectTimeWait ?? 2000,
    };

    if (this.options.user && this.options.password) {
      connectionOptions.user = this.options.user;
      connectionOptions.pass = this.options.password;
    }

    return connectionOptions;
  }

  private watchStatus(nc: NatsConnection): void {
    const watch = async (): Promise<void> => {
      for await (const status of nc.status()) {
        switch (status.type) {
          case Events.Disconnect:
            this.state = 'disconnected';
            this.logger.warn('NATS connection lost');
            this.emit('disconnected');
            break;

          case DebugEvents.Reconnecting:
            this.state = 'reconnecting';
            this.logger.info('NATS reconnecting');
            break;

          case Events.Reconnect:
            this.state = 'connected';
            this.logger.info('NATS reconnected');
            this.emit('connected');
            break;

          case Events.Error: {
            const error = new Error(String(status.data));
            this.logger.error({ err: error }, 'NATS error');
            this.emit('error', error);
            break;
          }
        }
      }
    };

    watch().catch((error: unknown) => {
      this.logger.error({ err: error }, 'NATS status watcher stopped');
    });
  }
}
