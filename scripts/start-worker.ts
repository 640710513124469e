#!/usr/bin/env tsx
/**
 * Worker Startup Script
 *
 * Starts a models worker that consumes background tasks from the broker.
 *
 * Usage:
 *   tsx scripts/start-worker.ts [--config path/to/models.yaml] [--worker-id <id>]
 */

import * as path from 'node:path';
import { loadConfig } from '../src/config/loader.js';
import { createRuntime } from '../src/runtime.js';

interface StartWorkerOptions {
  configPath?: string;
  workerId?: string;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined) {
    console.error(`Error: ${flag} requires a value`);
    process.exit(1);
  }
  return value;
}

function parseArgs(): StartWorkerOptions {
  const args = process.argv.slice(2);
  const options: StartWorkerOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--help':
      case '-h':
        printHelp();
        process.exit(0);
        break;

      case '--config':
      case '-c':
        options.configPath = requireValue(arg, args[++i]);
        break;

      case '--worker-id':
      case '-w':
        options.workerId = requireValue(arg, args[++i]);
        break;

      default:
        console.error(`Error: Unknown option: ${arg}`);
        printHelp();
        process.exit(1);
    }
  }

  return options;
}

function printHelp(): void {
  console.log(`
Models Worker

Consumes train/predict tasks from the broker and runs them against the
shared models folder.

Usage:
  tsx scripts/start-worker.ts [options]

Options:
  --config, -c <path>     Path to configuration (default: config/models.yaml)
  --worker-id, -w <id>    Worker ID (default: auto-generated UUID)
  --help, -h              Show this help message

Environment Variables:
  NODE_ENV              Selects the environments block (development, test, production)
  MODELS_LOG_LEVEL      Log level (trace, debug, info, warn, error)
  MODELS_FOLDER         Overrides models.folder
  MODELS_BROKER_URL     Overrides broker.url
  MODELS_BACKEND_URL    Overrides backend.url
  MODELS_DATABASE_URL   Overrides database.url

Signals:
  SIGINT (Ctrl+C)     Graceful shutdown
  SIGTERM             Graceful shutdown
`);
}

async function main(): Promise<void> {
  const options = parseArgs();

  const config = loadConfig(options.configPath ? path.resolve(options.configPath) : undefined);
  const runtime = createRuntime(config);
  const worker = runtime.createWorker({ workerId: options.workerId });
  worker.on('stateChange', (state) => {
    console.log(`[Worker] State: ${state}`);
  });

  try {
    await runtime.connect();
    await worker.start();

    console.log('');
    console.log(`Worker ID:     ${worker.getWorkerId()}`);
    console.log(`Models folder: ${config.models.folder}`);
    console.log(`Database:      ${runtime.database ? 'enabled' : 'disabled'}`);
    console.log('');
    console.log('Press Ctrl+C to stop the worker');
  } catch (error) {
    console.error('Startup failed:', error instanceof Error ? error.message : String(error));
    await runtime.close().catch((closeError: unknown) => {
      console.error('Error while closing connections:', closeError);
    });
    process.exit(1);
  }

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`\nReceived ${signal}, draining...`);
    try {
      await worker.stop();
      await runtime.close();
      console.log('Worker shutdown complete');
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
