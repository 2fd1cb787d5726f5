/**
 * DICEPOOL - API Module
 *
 * REST endpoints over the engine.
 * Routes: /bet, /sweep, /pool, /house-edge, /events, /faucet
 */

export { createApiRouter, ERROR_STATUS, API_VERSION } from './routes';
export type { ApiOptions } from './routes';
export { serialize } from './serialize';
export type { JsonValue } from './serialize';
