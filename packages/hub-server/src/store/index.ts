import { MemoryProfileStore } from './memory.js';
import { VolumeProfileStore } from './volume.js';
import { RedisProfileStore } from './redis.js';
import { ConfigError } from '../errors.js';
import type { IProfileStore } from './types.js';

export type { IProfileStore } from './types.js';
export { MemoryProfileStore, VolumeProfileStore, RedisProfileStore };

export interface StoreOptions {
  driver: string;
  volumePath?: string;
  redisUrl?: string;
}

export async function createStore(opts: StoreOptions): Promise<IProfileStore> {
  switch (opts.driver) {
    case 'memory':
      return new MemoryProfileStore();
    case 'volume':
      return new VolumeProfileStore(opts.volumePath || undefined);
    case 'redis': {
      const store = new RedisProfileStore(opts.redisUrl || undefined);
      await store.connect();
      return store;
    }
    default:
      throw new ConfigError(`Unknown store driver '${opts.driver}'`);
  }
}
