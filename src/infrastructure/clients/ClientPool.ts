import {
  ClientCredentials,
  ClientIdentity,
  ClientLease,
  ClientMode,
  ClientStats,
  IClientPool,
  ILogger,
  IRemoteChunkClient,
  IRemoteClientFactory
} from '../../domain/interfaces';
import { UpstreamError } from '../../domain/errors';
import { SingleFlightCache } from '../cache/SingleFlightCache';

/**
 * A pooled client and the number of streams currently using it
 */
interface PooledClient {
  readonly key: string;
  readonly api: IRemoteChunkClient;
  workload: number;
  idleTimer?: NodeJS.Timeout;
}

export interface ClientPoolOptions {
  mode: ClientMode;
  // Shared mode: bot tokens, one client each
  botTokens: readonly string[];
  poolSize: number;
  // Dedicated mode: used when the caller has no identity of its own
  defaultIdentity?: ClientIdentity;
  // Dedicated mode: idle clients are disconnected after this many ms
  idleTimeout?: number;
  // Shared mode: a token that failed to connect is skipped for this many ms
  retryDelay?: number;
  now?: () => number;
}

/**
 * Hands out remote clients per stream.
 *
 * Dedicated mode keeps one client per caller identity. Shared mode keeps a
 * fixed set of bot clients and gives each stream the one with the fewest
 * active streams among those that connected. Selection and the counter
 * update run without an await in between, so two streams never race for
 * the same slot.
 */
export class ClientPool implements IClientPool {
  readonly mode: ClientMode;
  private readonly clients = new SingleFlightCache<PooledClient>({ ttl: Infinity, maxEntries: Infinity });
  private readonly created = new Map<string, PooledClient>();
  // Last failed connect per shared client key
  private readonly failures = new Map<string, number>();
  private readonly botTokens: readonly string[];
  private readonly defaultIdentity?: ClientIdentity;
  private readonly idleTimeout: number;
  private readonly retryDelay: number;
  private readonly now: () => number;

  constructor(
    private readonly factory: IRemoteClientFactory,
    private readonly logger: ILogger,
    options: ClientPoolOptions
  ) {
    this.mode = options.mode;
    this.botTokens = options.botTokens.slice(0, options.poolSize);
    this.defaultIdentity = options.defaultIdentity;
    this.idleTimeout = options.idleTimeout ?? Infinity;
    this.retryDelay = options.retryDelay ?? 30_000;
    this.now = options.now ?? Date.now;

    if (this.mode === 'shared' && this.botTokens.length === 0) {
      throw new Error('ClientPool: shared mode needs at least one bot token');
    }
  }

  async acquire(identity?: ClientIdentity): Promise<ClientLease> {
    const candidates = this.mode === 'shared'
      ? await this.getSharedClients()
      : [await this.getDedicated(identity)];

    // Ties keep the earlier client
    const pooled = candidates.reduce((best, candidate) => (candidate.workload < best.workload ? candidate : best));
    pooled.workload++;
    clearTimeout(pooled.idleTimer);
    pooled.idleTimer = undefined;
    this.logger.debug(`[pool] Acquired ${pooled.api.id} (workload ${pooled.workload})`);

    let released = false;
    return {
      client: pooled.api,
      release: (): void => {
        if (released) {
          return;
        }
        released = true;
        pooled.workload--;
        this.logger.debug(`[pool] Released ${pooled.api.id} (workload ${pooled.workload})`);
        this.scheduleIdleEviction(pooled);
      }
    };
  }

  getStats(): ClientStats[] {
    return [...this.created.values()].map((pooled) => ({
      id: pooled.api.id,
      workload: pooled.workload
    }));
  }

  async destroy(): Promise<void> {
    const clients = [...this.created.values()];
    clients.forEach((pooled) => clearTimeout(pooled.idleTimer));
    this.created.clear();
    this.clients.clear();
    const results = await Promise.allSettled(clients.map((pooled) => pooled.api.disconnect()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.warn(`[pool] Failed to disconnect ${clients[index].api.id}:`, result.reason);
      }
    });
  }

  /**
   * Connected shared clients. Tokens that failed recently are skipped
   * unless no other token is left to try.
   */
  private async getSharedClients(): Promise<PooledClient[]> {
    const all = this.botTokens.map((token, index) => ({ key: `bot:${index}`, token }));
    const eligible = all.filter(({ key }) => this.created.has(key) || !this.isCoolingDown(key));
    const attempts = eligible.length > 0 ? eligible : all;

    const results = await Promise.allSettled(
      attempts.map(({ key, token }) => this.getClient(key, { kind: 'bot', token }))
    );

    const ready: PooledClient[] = [];
    results.forEach((result, index) => {
      const { key } = attempts[index];
      if (result.status === 'fulfilled') {
        this.failures.delete(key);
        ready.push(result.value);
      } else {
        this.failures.set(key, this.now());
        this.logger.warn(`[pool] Shared client ${key} unavailable:`, result.reason);
      }
    });

    if (ready.length === 0) {
      throw new UpstreamError(`None of the ${attempts.length} shared clients could connect`);
    }
    return ready;
  }

  private isCoolingDown(key: string): boolean {
    const failedAt = this.failures.get(key);
    return failedAt !== undefined && this.now() - failedAt < this.retryDelay;
  }

  private getDedicated(identity?: ClientIdentity): Promise<PooledClient> {
    const owner = identity ?? this.defaultIdentity;
    if (!owner) {
      return Promise.reject(new UpstreamError('No session available for a dedicated client'));
    }
    return this.getClient(`user:${owner.userId}`, {
      kind: 'user',
      userId: owner.userId,
      session: owner.session
    });
  }

  private getClient(key: string, credentials: ClientCredentials): Promise<PooledClient> {
    return this.clients.get(key, async () => {
      let api: IRemoteChunkClient;
      try {
        api = await this.factory.create(credentials);
      } catch (error) {
        throw new UpstreamError(`Failed to create remote client ${key}`, { cause: error });
      }
      const pooled: PooledClient = { key, api, workload: 0 };
      this.created.set(key, pooled);
      this.logger.info(`[pool] Connected client ${api.id}`);
      return pooled;
    });
  }

  private scheduleIdleEviction(pooled: PooledClient): void {
    if (this.mode !== 'dedicated' || pooled.workload > 0 || !Number.isFinite(this.idleTimeout)) {
      return;
    }
    clearTimeout(pooled.idleTimer);
    pooled.idleTimer = setTimeout(() => {
      void this.evict(pooled);
    }, this.idleTimeout);
    pooled.idleTimer.unref();
  }

  private async evict(pooled: PooledClient): Promise<void> {
    if (pooled.workload > 0 || this.created.get(pooled.key) !== pooled) {
      return;
    }
    this.created.delete(pooled.key);
    this.clients.delete(pooled.key);
    this.logger.info(`[pool] Disconnecting idle client ${pooled.api.id}`);
    try {
      await pooled.api.disconnect();
    } catch (error) {
      this.logger.warn(`[pool] Failed to disconnect ${pooled.api.id}:`, error);
    }
  }
}
