export { SessionHandle } from './sessionHandle';
export { SessionPool, type PoolStats, type SessionPoolOptions } from './sessionPool';
