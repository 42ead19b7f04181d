import { describe, it, expect } from 'vitest';
import { MAX_TRANSFER_UNIT, parseConfig } from './config';

describe('parseConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    const config = parseConfig({});

    expect(config.PORT).toBe(3000);
    expect(config.TRANSFER_UNIT).toBe(MAX_TRANSFER_UNIT);
    expect(config.MULTI_CLIENT).toBe(false);
    expect(config.POOL_SIZE).toBe(8);
    expect(config.CLIENT_IDLE_TIMEOUT).toBe(900_000);
    expect(config.CLIENT_RETRY_DELAY).toBe(30_000);
    expect(config.BOT_TOKENS).toEqual([]);
    expect(config.CACHE_TTL).toBe(600_000);
    expect(config.LOG_LEVEL).toBe('info');
  });

  it('should split and trim bot tokens', () => {
    const config = parseConfig({ BOT_TOKENS: ' token-a, ,token-b ', MULTI_CLIENT: 'true' });

    expect(config.BOT_TOKENS).toEqual(['token-a', 'token-b']);
    expect(config.MULTI_CLIENT).toBe(true);
  });

  it('should accept a transfer unit that divides 1 MiB', () => {
    expect(parseConfig({ TRANSFER_UNIT: '524288' }).TRANSFER_UNIT).toBe(524288);
    expect(parseConfig({ TRANSFER_UNIT: '4096' }).TRANSFER_UNIT).toBe(4096);
  });

  it.each(['1000', '12288', '2097152'])('should reject transfer unit %s', (unit) => {
    expect(() => parseConfig({ TRANSFER_UNIT: unit })).toThrow(/TRANSFER_UNIT/);
  });

  it('should ignore an unknown log level', () => {
    expect(parseConfig({ LOG_LEVEL: 'verbose' }).LOG_LEVEL).toBe('info');
    expect(parseConfig({ LOG_LEVEL: 'debug' }).LOG_LEVEL).toBe('debug');
  });

  it('should ignore non-numeric ports', () => {
    expect(parseConfig({ PORT: 'abc' }).PORT).toBe(3000);
  });
});
