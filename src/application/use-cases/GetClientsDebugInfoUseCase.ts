/**
 * Use case for inspecting the client pool and caches
 */

import { ClientMode, ClientStats, IClientPool } from '../../domain/interfaces';

export interface ClientsDebugInfo {
  mode: ClientMode;
  clients: ClientStats[];
  totalWorkload: number;
  cachedEntries: number;
}

/**
 * Anything exposing a cache size
 */
export interface CacheSizeSource {
  readonly cacheSize: number;
}

export class GetClientsDebugInfoUseCase {
  constructor(
    private pool: IClientPool,
    private caches: CacheSizeSource[]
  ) {}

  execute(): ClientsDebugInfo {
    const clients = this.pool.getStats();
    return {
      mode: this.pool.mode,
      clients,
      totalWorkload: clients.reduce((sum, client) => sum + client.workload, 0),
      cachedEntries: this.caches.reduce((sum, cache) => sum + cache.cacheSize, 0)
    };
  }
}
