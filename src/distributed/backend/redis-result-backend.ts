/**
 * Redis result backend
 *
 * One hash per task at `<keyPrefix>:<taskId>`; every field holds a JSON
 * value. State changes run as a Lua script so the compare and the write are
 * one atomic step on the server. Terminal records expire after `resultTtlS`.
 */

import { createClient } from 'redis';
import type { Logger } from 'pino';
import type { TaskRecord, TaskState, TransitionResult } from '../../types/tasks.js';
import { isTerminalState } from '../../types/tasks.js';
import { TaskRecordSchema } from '../../types/schemas/task.js';
import { AlreadyExistsError, BrokerError, ConnectionError, toError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { ResultBackend, TaskUpdate } from './result-backend.js';

export type RedisClient = ReturnType<typeof createClient>;

export interface RedisResultBackendOptions {
  url?: string;
  keyPrefix?: string;
  resultTtlS?: number;
  connectTimeoutMs?: number;
  /** Pre-built client, mainly for tests */
  client?: RedisClient;
  logger?: Logger;
}

/**
 * KEYS[1] record key
 * ARGV[1] expiry in seconds, 0 for none
 * ARGV[2] number of expected states n
 * ARGV[3..2+n] expected states, JSON-encoded
 * ARGV[3+n..] field/value pairs to write
 *
 * Returns 1 when applied, 0 when the state did not match, -1 when missing.
 */
const COMPARE_AND_SET_SCRIPT = `
local current = redis.call('HGET', KEYS[1], 'state')
if not current then return -1 end
local n = tonumber(ARGV[2])
local matched = false
for i = 3, 2 + n do
  if ARGV[i] == current then matched = true end
end
if not matched then return 0 end
if #ARGV > 2 + n then
  redis.call('HSET', KEYS[1], unpack(ARGV, 3 + n))
end
local ttl = tonumber(ARGV[1])
if ttl > 0 then redis.call('EXPIRE', KEYS[1], ttl) end
return 1
`;

/**
 * KEYS[1] record key, ARGV field/value pairs. Returns 0 if the key exists.
 */
const CREATE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then return 0 end
redis.call('HSET', KEYS[1], unpack(ARGV))
return 1
`;

/**
 * Flatten defined fields into HSET's field/value argument list
 */
export function encodeFields(fields: object): string[] {
  const args: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      args.push(key, JSON.stringify(value));
    }
  }
  return args;
}

/**
 * Rebuild a record from HGETALL output; null for an empty hash
 *
 * @throws {BrokerError} if the stored fields do not form a valid record
 */
export function decodeRecord(hash: Record<string, string>): TaskRecord | null {
  const entries = Object.entries(hash);
  if (entries.length === 0) {
    return null;
  }

  const raw: Record<string, unknown> = {};
  try {
    for (const [key, value] of entries) {
      raw[key] = JSON.parse(value);
    }
  } catch (error) {
    throw new BrokerError(`Task record holds invalid JSON: ${toError(error).message}`, 'BROKER_ERROR', toError(error));
  }

  const parsed = TaskRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BrokerError(`Task record is malformed: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
  }
  return parsed.data;
}

export class RedisResultBackend implements ResultBackend {
  private readonly client: RedisClient;
  private readonly keyPrefix: string;
  private readonly resultTtlS: number;
  private readonly logger: Logger;

  constructor(options: RedisResultBackendOptions = {}) {
    this.keyPrefix = options.keyPrefix ?? 'models:task';
    this.resultTtlS = options.resultTtlS ?? 86400;
    this.logger = options.logger ?? createLogger('RedisResultBackend');
    this.client =
      options.client ??
      createClient({
        url: options.url ?? 'redis://localhost:6379/0',
        socket: { connectTimeout: options.connectTimeoutMs ?? 5000 },
      });

    this.client.on('error', (error: unknown) => {
      this.logger.error({ err: error }, 'Redis error');
    });
  }

  keyFor(taskId: string): string {
    return `${this.keyPrefix}:${taskId}`;
  }

  /**
   * @throws {ConnectionError} if Redis is unreachable
   */
  async connect(): Promise<void> {
    if (this.client.isOpen) {
      return;
    }
    try {
      await this.client.connect();
      this.logger.info('Connected to Redis result backend');
    } catch (error) {
      throw new ConnectionError(`Failed to connect to Redis: ${toError(error).message}`, toError(error));
    }
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }

  async create(record: TaskRecord): Promise<void> {
    const created = await this.run('create', () =>
      this.client.eval(CREATE_SCRIPT, { keys: [this.keyFor(record.taskId)], arguments: encodeFields(record) })
    );
    if (created === 0) {
      throw new AlreadyExistsError(`Task "${record.taskId}" already exists`);
    }
  }

  async get(taskId: string): Promise<TaskRecord | null> {
    const hash = await this.run('get', () => this.client.hGetAll(this.keyFor(taskId)));
    return decodeRecord(hash);
  }

  async compareAndSet(taskId: string, expected: readonly TaskState[], update: TaskUpdate): Promise<TransitionResult> {
    const ttl = update.state !== undefined && isTerminalState(update.state) ? this.resultTtlS : 0;
    const args = [
      String(ttl),
      String(expected.length),
      ...expected.map((state) => JSON.stringify(state)),
      ...encodeFields(update),
    ];

    const outcome = await this.run('compareAndSet', () =>
      this.client.eval(COMPARE_AND_SET_SCRIPT, { keys: [this.keyFor(taskId)], arguments: args })
    );
    if (outcome === -1) {
      return { applied: false, record: null };
    }

    const record = await this.get(taskId);
    return { applied: outcome === 1, record };
  }

  async delete(taskId: string): Promise<boolean> {
    const removed = await this.run('delete', () => this.client.del(this.keyFor(taskId)));
    return removed > 0;
  }

  private async run<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      this.logger.error({ err: error, operation }, 'Redis command failed');
      throw new BrokerError(`Result backend ${operation} failed: ${toError(error).message}`, 'BROKER_ERROR', toError(error));
    }
  }
}
