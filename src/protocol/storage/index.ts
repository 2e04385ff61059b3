export { PoolStorage, isPoolStateFile, STATE_VERSION } from './PoolStorage.js';
export type { PoolStateFile } from './PoolStorage.js';
