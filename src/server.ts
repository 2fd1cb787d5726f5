#!/usr/bin/env tsx
/**
 * DICEPOOL - HTTP Server
 *
 * Usage:
 *   npm start
 *
 * Reads configuration from the environment (and .env), see src/config.ts.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { loadConfig } from './config';
import { buildRuntime } from './runtime';

const config = loadConfig();
const runtime = buildRuntime(config);
runtime.start();

const server = serve({ fetch: runtime.app.fetch, port: config.PORT }, (info) => {
  console.log(`[api] Listening on http://localhost:${info.port}`);
});

function shutdown(signal: string): void {
  console.log(`[api] ${signal} received, shutting down`);
  runtime.stop();
  server.close();
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
