export {
  ConcurrentPool,
  type PoolItemCompletion,
} from './utils/concurrent-pool';
export {
  isCommandNotFoundError,
  spawnAsync,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
