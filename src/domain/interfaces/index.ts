/**
 * Domain interfaces (ports) - exports all interfaces
 */

export * from './IFileRepository';
export * from './IRemoteChunkClient';
export * from './IClientPool';
export * from './IStreamService';
export * from './ILogger';
