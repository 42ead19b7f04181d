/**
 * Unit tests for ClientPool
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ClientPool } from './ClientPool';
import { ClientCredentials } from '../../domain/interfaces';
import { UpstreamError } from '../../domain/errors';
import { MockClientFactory, MockRemoteStorage, createSilentLogger } from '../../__mocks__/remote-backend';

describe('ClientPool', () => {
    let factory: MockClientFactory;

    beforeEach(() => {
        factory = new MockClientFactory(new MockRemoteStorage());
    });

    describe('shared mode', () => {
        function createPool(botTokens: string[], poolSize = 8): ClientPool {
            return new ClientPool(factory, createSilentLogger(), { mode: 'shared', botTokens, poolSize });
        }

        it('should spread concurrent streams over the least loaded clients', async () => {
            const pool = createPool(['a', 'b', 'c']);

            const leases = await Promise.all([pool.acquire(), pool.acquire(), pool.acquire(), pool.acquire()]);

            expect(leases.map((lease) => lease.client.id)).toEqual(['bot:a', 'bot:b', 'bot:c', 'bot:a']);
            expect(pool.getStats()).toEqual([
                { id: 'bot:a', workload: 2 },
                { id: 'bot:b', workload: 1 },
                { id: 'bot:c', workload: 1 }
            ]);
        });

        it('should prefer a client freed by a released lease', async () => {
            const pool = createPool(['a', 'b']);
            const first = await pool.acquire();
            await pool.acquire();

            first.release();
            const next = await pool.acquire();

            expect(next.client.id).toBe('bot:a');
        });

        it('should restore counters on release and ignore double release', async () => {
            const pool = createPool(['a']);
            const lease = await pool.acquire();

            lease.release();
            lease.release();

            expect(pool.getStats()).toEqual([{ id: 'bot:a', workload: 0 }]);
        });

        it('should create each client once', async () => {
            const pool = createPool(['a', 'b']);

            await Promise.all([pool.acquire(), pool.acquire(), pool.acquire()]);

            expect(factory.created).toHaveLength(2);
        });

        it('should only use as many tokens as the pool size allows', async () => {
            const pool = createPool(['a', 'b', 'c'], 2);

            await pool.acquire();

            expect(factory.created.map((client) => client.id)).toEqual(['bot:a', 'bot:b']);
        });

        it('should refuse to start without tokens', () => {
            expect(() => createPool([])).toThrow('at least one bot token');
        });

        it('should wrap factory failures and retry on the next acquire', async () => {
            const pool = createPool(['a']);
            const create = vi.spyOn(factory, 'create').mockRejectedValueOnce(new Error('flood wait'));

            await expect(pool.acquire()).rejects.toBeInstanceOf(UpstreamError);
            const lease = await pool.acquire();

            expect(lease.client.id).toBe('bot:a');
            expect(create).toHaveBeenCalledTimes(2);
        });
        describe('with a token that cannot connect', () => {
            let clock: number;

            beforeEach(() => {
                clock = 0;
                const connect = factory.create.bind(factory);
                vi.spyOn(factory, 'create').mockImplementation((credentials) =>
                    credentials.kind === 'bot' && credentials.token === 'b'
                        ? Promise.reject(new Error('token revoked'))
                        : connect(credentials)
                );
            });

            function attemptsFor(token: string): number {
                return vi.mocked(factory.create).mock.calls
                    .filter(([credentials]) => credentials.kind === 'bot' && credentials.token === token)
                    .length;
            }

            function createFlakyPool(): ClientPool {
                return new ClientPool(factory, createSilentLogger(), {
                    mode: 'shared',
                    botTokens: ['a', 'b'],
                    poolSize: 8,
                    retryDelay: 1000,
                    now: () => clock
                });
            }

            it('should keep serving from the clients that connected', async () => {
                const pool = createFlakyPool();

                const first = await pool.acquire();
                const second = await pool.acquire();

                expect([first.client.id, second.client.id]).toEqual(['bot:a', 'bot:a']);
                expect(pool.getStats()).toEqual([{ id: 'bot:a', workload: 2 }]);
            });

            it('should skip the failed token until the retry delay passed', async () => {
                const pool = createFlakyPool();

                await pool.acquire();
                clock = 999;
                await pool.acquire();
                expect(attemptsFor('b')).toBe(1);

                clock = 1000;
                await pool.acquire();
                expect(attemptsFor('b')).toBe(2);
                expect(attemptsFor('a')).toBe(1);
            });

            it('should fail when no token connects', async () => {
                const pool = new ClientPool(factory, createSilentLogger(), { mode: 'shared', botTokens: ['b'], poolSize: 8 });

                await expect(pool.acquire()).rejects.toThrow('None of the 1 shared clients could connect');
            });
        });
    });

    describe('dedicated mode', () => {
        it('should reuse the client bound to an identity', async () => {
            const pool = new ClientPool(factory, createSilentLogger(), { mode: 'dedicated', botTokens: [], poolSize: 8 });
            const identity = { userId: '7', session: 'test-session' };

            const first = await pool.acquire(identity);
            const second = await pool.acquire(identity);

            expect(first.client).toBe(second.client);
            expect(first.client.id).toBe('user:7');
        });

        it('should pass the session to the factory', async () => {
            const pool = new ClientPool(factory, createSilentLogger(), { mode: 'dedicated', botTokens: [], poolSize: 8 });
            const create = vi.spyOn(factory, 'create');

            await pool.acquire({ userId: '7', session: 'test-session' });

            const expected: ClientCredentials = { kind: 'user', userId: '7', session: 'test-session' };
            expect(create).toHaveBeenCalledWith(expected);
        });

        it('should fall back to the default identity', async () => {
            const pool = new ClientPool(factory, createSilentLogger(), {
                mode: 'dedicated',
                botTokens: [],
                poolSize: 8,
                defaultIdentity: { userId: 'default', session: 'test-session' }
            });

            const lease = await pool.acquire();

            expect(lease.client.id).toBe('user:default');
        });

        it('should fail without any identity', async () => {
            const pool = new ClientPool(factory, createSilentLogger(), { mode: 'dedicated', botTokens: [], poolSize: 8 });

            await expect(pool.acquire()).rejects.toThrow('No session available');
        });

        describe('idle clients', () => {
            const identity = { userId: '7', session: 'test-session' };

            beforeEach(() => {
                vi.useFakeTimers();
            });

            afterEach(() => {
                vi.useRealTimers();
            });

            function createIdlePool(): ClientPool {
                return new ClientPool(factory, createSilentLogger(), {
                    mode: 'dedicated',
                    botTokens: [],
                    poolSize: 8,
                    idleTimeout: 60_000
                });
            }

            it('should disconnect a client left idle and reconnect on demand', async () => {
                const pool = createIdlePool();
                const lease = await pool.acquire(identity);

                lease.release();
                await vi.advanceTimersByTimeAsync(60_000);

                expect(factory.created[0].disconnected).toBe(true);
                expect(pool.getStats()).toEqual([]);

                const next = await pool.acquire(identity);
                expect(next.client).not.toBe(lease.client);
                expect(factory.created).toHaveLength(2);
            });

            it('should keep a client that is picked up again before the timeout', async () => {
                const pool = createIdlePool();
                (await pool.acquire(identity)).release();

                await vi.advanceTimersByTimeAsync(30_000);
                await pool.acquire(identity);
                await vi.advanceTimersByTimeAsync(60_000);

                expect(factory.created[0].disconnected).toBe(false);
                expect(pool.getStats()).toEqual([{ id: 'user:7', workload: 1 }]);
            });

            it('should not evict while a stream is running', async () => {
                const pool = createIdlePool();
                await pool.acquire(identity);
                (await pool.acquire(identity)).release();

                await vi.advanceTimersByTimeAsync(120_000);

                expect(factory.created[0].disconnected).toBe(false);
            });
        });
    });

    it('should disconnect every client on destroy', async () => {
        const pool = new ClientPool(factory, createSilentLogger(), { mode: 'shared', botTokens: ['a', 'b'], poolSize: 8 });
        await pool.acquire();

        await pool.destroy();

        expect(factory.created.every((client) => client.disconnected)).toBe(true);
        expect(pool.getStats()).toEqual([]);
    });
});
