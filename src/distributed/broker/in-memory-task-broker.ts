/**
 * In-process task broker
 *
 * Same delivery contract as the NATS broker: each task goes to one consumer
 * (round robin), control messages go to all of them. Tasks published while
 * nobody consumes are held until a consumer attaches. Delivery is always
 * asynchronous.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { ControlMessage, TaskMessage } from '../../types/tasks.js';
import { ConnectionError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { BrokerSubscription, ControlHandler, TaskBroker, TaskHandler } from './task-broker.js';

export interface InMemoryTaskBrokerEvents {
  control: (message: ControlMessage) => void;
  published: (task: TaskMessage) => void;
}

export class InMemoryTaskBroker extends EventEmitter<InMemoryTaskBrokerEvents> implements TaskBroker {
  private consumers: TaskHandler[] = [];
  private readonly pending: TaskMessage[] = [];
  private cursor = 0;
  private connected = false;
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    super();
    this.logger = options.logger ?? createLogger('InMemoryTaskBroker');
  }

  async connect(): Promise<void> {
    this.connected = true;
  }

  async close(): Promise<void> {
    this.connected = false;
    this.consumers = [];
    this.removeAllListeners('control');
  }

  isConnected(): boolean {
    return this.connected;
  }

  /**
   * Tasks published with no consumer attached
   */
  pendingTasks(): TaskMessage[] {
    return [...this.pending];
  }

  async publishTask(task: TaskMessage): Promise<void> {
    this.requireConnected();
    const copy = structuredClone(task);
    this.emit('published', copy);

    if (this.consumers.length === 0) {
      this.pending.push(copy);
      return;
    }
    this.deliver(copy);
  }

  async publishControl(message: ControlMessage): Promise<void> {
    this.requireConnected();
    const copy = structuredClone(message);
    setImmediate(() => this.emit('control', copy));
  }

  consumeTasks(handler: TaskHandler): BrokerSubscription {
    this.requireConnected();
    this.consumers.push(handler);
    for (let task = this.pending.shift(); task; task = this.pending.shift()) {
      this.deliver(task);
    }

    return {
      unsubscribe: () => {
        this.consumers = this.consumers.filter((consumer) => consumer !== handler);
      },
    };
  }

  subscribeControl(handler: ControlHandler): BrokerSubscription {
    this.requireConnected();
    const listener = (message: ControlMessage): void => {
      this.invoke(() => handler(message), message.taskId);
    };
    this.on('control', listener);

    return {
      unsubscribe: () => {
        this.off('control', listener);
      },
    };
  }

  private deliver(task: TaskMessage): void {
    const consumer = this.consumers[this.cursor % this.consumers.length];
    this.cursor++;
    if (!consumer) {
      this.pending.push(task);
      return;
    }
    setImmediate(() => this.invoke(() => consumer(task), task.taskId));
  }

  private invoke(run: () => void | Promise<void>, taskId: string): void {
    Promise.resolve()
      .then(run)
      .catch((error: unknown) => {
        this.logger.error({ err: error, taskId }, 'Error processing message');
      });
  }

  private requireConnected(): void {
    if (!this.connected) {
      throw new ConnectionError('In-memory broker is not connected');
    }
  }
}
