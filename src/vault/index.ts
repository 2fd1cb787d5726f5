export { LiquidityPool } from './pool';
export type { PoolSnapshot, StakePosition, LiquidityPoolDeps } from './pool';
