/**
 * Client pool port
 */

import { IRemoteChunkClient } from './IRemoteChunkClient';

export type ClientMode = 'dedicated' | 'shared';

/**
 * Identity of the caller, set by the authentication layer
 */
export interface ClientIdentity {
  userId: string;
  session: string;
}

/**
 * A client checked out for one stream. `release()` is idempotent.
 */
export interface ClientLease {
  readonly client: IRemoteChunkClient;
  release(): void;
}

export interface ClientStats {
  id: string;
  workload: number;
}

export interface IClientPool {
  readonly mode: ClientMode;
  acquire(identity?: ClientIdentity): Promise<ClientLease>;
  getStats(): ClientStats[];
  destroy(): Promise<void>;
}
