import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('falls back to local defaults', () => {
    expect(loadConfig({})).toEqual({
      db: { host: 'localhost', database: 'storefront', user: 'postgres', password: 'postgres', port: 5432 },
      source: { baseUrl: 'https://dummyjson.com', pageSize: 100 },
      load: { lineItemPolicy: 'append', writeBatchSize: 500 },
      api: { port: 8000 },
      logLevel: 'info',
    });
  });

  it('lets each connection option be overridden independently', () => {
    const config = loadConfig({ POSTGRES_HOST: 'db.internal', POSTGRES_PORT: '6543' });

    expect(config.db).toEqual({
      host: 'db.internal',
      database: 'storefront',
      user: 'postgres',
      password: 'postgres',
      port: 6543,
    });
  });

  it('reads the line item policy and source settings', () => {
    const config = loadConfig({
      LINE_ITEM_POLICY: 'replace',
      SOURCE_BASE_URL: 'https://api.example.test/',
      SOURCE_PAGE_SIZE: '25',
      WRITE_BATCH_SIZE: '50',
    });

    expect(config.load).toEqual({ lineItemPolicy: 'replace', writeBatchSize: 50 });
    expect(config.source).toEqual({ baseUrl: 'https://api.example.test', pageSize: 25 });
  });

  it('treats empty values as unset', () => {
    expect(loadConfig({ POSTGRES_PASSWORD: '', API_PORT: '' }).db.password).toBe('postgres');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ LINE_ITEM_POLICY: 'merge' })).toThrow(ZodError);
    expect(() => loadConfig({ POSTGRES_PORT: 'abc' })).toThrow(ZodError);
  });

  it('returns a frozen object', () => {
    const config = loadConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.db)).toBe(true);
  });
});
