/**
 * NATS task broker
 *
 * Tasks are published on `<prefix>.tasks` and consumed through a queue
 * group, so each task reaches one worker. Revokes go out on
 * `<prefix>.control` to every worker.
 */

import type { Logger } from 'pino';
import type { ControlMessage, TaskMessage } from '../../types/tasks.js';
import { ControlMessageSchema, TaskMessageSchema } from '../../types/schemas/task.js';
import { createLogger } from '../../utils/logger.js';
import { NatsClient, type NatsClientOptions } from '../nats/client.js';
import type { BrokerSubscription, ControlHandler, TaskBroker, TaskHandler } from './task-broker.js';

export interface NatsTaskBrokerOptions extends NatsClientOptions {
  subjectPrefix?: string;
  queueGroup?: string;
  /** Pre-built client, mainly for tests */
  client?: NatsClient;
}

export class NatsTaskBroker implements TaskBroker {
  readonly taskSubject: string;
  readonly controlSubject: string;
  private readonly queueGroup: string;
  private readonly client: NatsClient;
  private readonly logger: Logger;

  constructor(options: NatsTaskBrokerOptions) {
    const prefix = options.subjectPrefix ?? 'models';
    this.taskSubject = `${prefix}.tasks`;
    this.controlSubject = `${prefix}.control`;
    this.queueGroup = options.queueGroup ?? 'models-workers';
    this.logger = options.logger ?? createLogger('NatsTaskBroker');
    this.client = options.client ?? new NatsClient({ ...options, logger: this.logger });
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async close(): Promise<void> {
    if (this.client.isConnected()) {
      await this.client.disconnect();
    }
  }

  async publishTask(task: TaskMessage): Promise<void> {
    await this.client.publish(this.taskSubject, task);
    this.logger.debug({ taskId: task.taskId, operation: task.payload.operation }, 'Task published');
  }

  async publishControl(message: ControlMessage): Promise<void> {
    await this.client.publish(this.controlSubject, message);
  }

  consumeTasks(handler: TaskHandler): BrokerSubscription {
    return this.client.subscribe(
      this.taskSubject,
      async (data) => {
        const parsed = TaskMessageSchema.safeParse(data);
        if (!parsed.success) {
          this.logger.warn({ issues: parsed.error.issues }, 'Discarding malformed task message');
          return;
        }
        await handler(parsed.data);
      },
      { queue: this.queueGroup }
    );
  }

  subscribeControl(handler: ControlHandler): BrokerSubscription {
    return this.client.subscribe(this.controlSubject, async (data) => {
      const parsed = ControlMessageSchema.safeParse(data);
      if (!parsed.success) {
        this.logger.warn({ issues: parsed.error.issues }, 'Discarding malformed control message');
        return;
      }
      await handler(parsed.data);
    });
  }
}
