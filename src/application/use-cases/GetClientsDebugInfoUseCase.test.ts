/**
 * Unit tests for GetClientsDebugInfoUseCase
 */

import { describe, it, expect, vi } from 'vitest';
import { GetClientsDebugInfoUseCase } from './GetClientsDebugInfoUseCase';
import { IClientPool } from '../../domain/interfaces';

describe('GetClientsDebugInfoUseCase', () => {
    it('should sum workloads and cache sizes', () => {
        const pool: IClientPool = {
            mode: 'shared',
            acquire: vi.fn(),
            getStats: vi.fn(() => [
                { id: 'bot:1', workload: 2 },
                { id: 'bot:2', workload: 1 }
            ]),
            destroy: vi.fn()
        };

        const useCase = new GetClientsDebugInfoUseCase(pool, [{ cacheSize: 3 }, { cacheSize: 4 }]);

        expect(useCase.execute()).toEqual({
            mode: 'shared',
            clients: [
                { id: 'bot:1', workload: 2 },
                { id: 'bot:2', workload: 1 }
            ],
            totalWorkload: 3,
            cachedEntries: 7
        });
    });
});
