/**
 * DICEPOOL - Library entry
 *
 * The HTTP server lives in src/server.ts; this module exposes the engine
 * for embedding and scripts.
 */

export * from './betting';
export * from './chain';
export * from './vault';
export * from './engine';
export * from './api';
export { ConfigSchema, loadConfig } from './config';
export type { AppConfig } from './config';
export { buildRuntime } from './runtime';
export type { Runtime } from './runtime';
