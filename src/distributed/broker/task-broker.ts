/**
 * Task broker contract
 *
 * Carries task messages to exactly one worker and control messages to all
 * of them. State lives in the result backend, not here.
 */

import type { ControlMessage, TaskMessage } from '../../types/tasks.js';

export type TaskHandler = (task: TaskMessage) => void | Promise<void>;
export type ControlHandler = (message: ControlMessage) => void | Promise<void>;

export interface BrokerSubscription {
  unsubscribe(): void;
}

export interface TaskBroker {
  connect(): Promise<void>;
  close(): Promise<void>;

  /**
   * @throws {BrokerError} if the message could not be delivered to the broker
   */
  publishTask(task: TaskMessage): Promise<void>;

  /**
   * Broadcast to every worker
   */
  publishControl(message: ControlMessage): Promise<void>;

  /**
   * Consume task messages; with several consumers each task reaches one
   */
  consumeTasks(handler: TaskHandler): BrokerSubscription;

  subscribeControl(handler: ControlHandler): BrokerSubscription;
}
