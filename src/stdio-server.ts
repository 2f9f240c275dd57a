#!/usr/bin/env node
/**
 * Task store over stdio: one JSON-RPC request per stdin line, one response per stdout line.
 * Logs go to stderr.
 */

import path from 'path';
import readline from 'readline';
import { CONFIG } from './config.js';
import { TaskStore, type Logger } from './utils/db.js';
import { createRPCHandler } from './server/rpc-handler.js';
import { createLineProcessor } from './server/stdio.js';

const logger: Logger = { log: console.error, warn: console.error, error: console.error };

const DB_PATH = path.join(path.resolve(CONFIG.dataDir), CONFIG.dbFile);

const store = TaskStore.open(DB_PATH, { logger });
const processLine = createLineProcessor(createRPCHandler(store, logger, { strictUpdate: CONFIG.strictUpdate }));

const rl = readline.createInterface({
  input: process.stdin,
  terminal: false
});

logger.log(`[tasks-stdio] serving ${DB_PATH}`);

rl.on('line', (line) => {
  const out = processLine(line);
  if (out !== null) {
    process.stdout.write(out + '\n');
  }
});

function shutdown(reason: string) {
  logger.log(`[tasks-stdio] ${reason}, closing store`);
  if (store.conn.db.open) {
    store.close();
  }
  process.exit(0);
}

rl.on('close', () => shutdown('stdin closed'));
process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
