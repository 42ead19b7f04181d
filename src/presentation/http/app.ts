import express, { Express } from 'express';
import config from '../../config';
import { IClientPool, IFileRepository, ILogger } from '../../domain/interfaces';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';
import { SingleFlightCacheOptions } from '../../infrastructure/cache/SingleFlightCache';
import { CachedFileRepository } from '../../infrastructure/metadata/CachedFileRepository';
import { PartResolver } from '../../infrastructure/parts/PartResolver';
import { FileStreamService } from '../../infrastructure/streaming/FileStreamService';
import { StreamFileUseCase } from '../../application/use-cases/StreamFileUseCase';
import { GetFileInfoUseCase } from '../../application/use-cases/GetFileInfoUseCase';
import { GetClientsDebugInfoUseCase } from '../../application/use-cases/GetClientsDebugInfoUseCase';
import { FileController } from './controllers/FileController';
import { DebugController } from './controllers/DebugController';
import { createFileRoutes } from './routes/files.routes';

export interface AppDependencies {
    fileRepository: IFileRepository;
    clientPool: IClientPool;
    logger?: ILogger;
    transferUnit?: number;
    cacheOptions?: SingleFlightCacheOptions;
    defaultChannelId?: string;
}

/**
 * Creates and configures Express application
 * Can be used both for production server and testing
 */
export function createApp(dependencies: AppDependencies): Express {
    const appLogger = dependencies.logger ?? new ConsoleLogger(config.LOG_LEVEL);
    const cacheOptions = dependencies.cacheOptions ?? {
        ttl: config.CACHE_TTL,
        maxEntries: config.CACHE_MAX_ENTRIES
    };

    const fileRepository = new CachedFileRepository(dependencies.fileRepository, cacheOptions);
    const partResolver = new PartResolver(
        appLogger,
        cacheOptions,
        dependencies.defaultChannelId ?? config.CHANNEL_ID
    );
    const streamService = new FileStreamService(dependencies.clientPool, partResolver, appLogger, {
        transferUnit: dependencies.transferUnit ?? config.TRANSFER_UNIT
    });

    // Initialize use cases
    const streamFileUseCase = new StreamFileUseCase(fileRepository, appLogger);
    const getFileInfoUseCase = new GetFileInfoUseCase(fileRepository);
    const getClientsDebugInfoUseCase = new GetClientsDebugInfoUseCase(dependencies.clientPool, [
        fileRepository,
        partResolver
    ]);

    // Initialize controllers
    const fileController = new FileController(streamFileUseCase, getFileInfoUseCase, streamService, appLogger);
    const debugController = new DebugController(getClientsDebugInfoUseCase);

    const app: Express = express();
    app.disable('x-powered-by');

    app.use('/', createFileRoutes(fileController, debugController));

    return app;
}
