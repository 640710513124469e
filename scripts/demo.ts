#!/usr/bin/env tsx
/**
 * Walkthrough of the synchronous and background APIs against a temporary
 * folder, with the in-process broker, result backend and table database.
 *
 * Usage:
 *   tsx scripts/demo.ts
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { validateConfig } from '../src/config/loader.js';
import { createRuntime } from '../src/runtime.js';
import { InMemoryTaskBroker } from '../src/distributed/broker/in-memory-task-broker.js';
import { InMemoryResultBackend } from '../src/distributed/backend/in-memory-result-backend.js';
import { InMemoryTableDatabase } from '../src/database/in-memory-table-database.js';

async function main(): Promise<void> {
  const folder = await mkdtemp(join(tmpdir(), 'models-demo-'));
  const config = validateConfig({ models: { folder }, worker: { revoke_poll_ms: 50 } });
  const runtime = createRuntime(config, {
    broker: new InMemoryTaskBroker(),
    backend: new InMemoryResultBackend(),
    database: new InMemoryTableDatabase({
      readings: [
        { hours: 1, score: 52 },
        { hours: 2, score: 61 },
        { hours: 3, score: 70 },
      ],
    }),
  });

  try {
    await runtime.connect();
    const { manager, orchestrator } = runtime;

    console.log('== Synchronous ==');
    await manager.create('m1', 'demo');
    console.log('trained:', await manager.input('m1', [{ a: 1 }]));
    console.log('loaded:', (await manager.get('m1')).lastLoaded);
    console.log('output:', await manager.output('m1', [{ a: 1 }]));
    await manager.delete('m1');

    console.log('\n== Background ==');
    const worker = runtime.createWorker({ workerId: 'demo-worker' });
    await worker.start();

    await orchestrator.create('scores', 'linear', { settings: { x: 'hours', y: 'score' } });
    await orchestrator.inputDb('scores', 'readings');
    console.log('input_db:', await orchestrator.wait('scores'));

    await orchestrator.updateDb('scores', 'readings', 'predictions');
    await orchestrator.wait('scores');
    console.log('update_db result:', await orchestrator.getResult('scores'));
    console.log('predictions:', await runtime.database?.readTable('predictions'));

    await worker.stop();
    await orchestrator.shutdown();
  } finally {
    await runtime.close();
    await rm(folder, { recursive: true, force: true });
  }
}

main().catch((error: unknown) => {
  console.error('Demo failed:', error);
  process.exit(1);
});
