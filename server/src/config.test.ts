import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({ port: 8787, dataDir: path.resolve('data'), defaultUser: 'default' });
  });

  it('reads the environment', () => {
    expect(loadConfig({ PORT: '9000', DATA_DIR: '/srv/ledger', DEFAULT_USER: 'household' })).toEqual({
      port: 9000,
      dataDir: path.resolve('/srv/ledger'),
      defaultUser: 'household',
    });
  });

  it.each([
    { PORT: 'eighty' },
    { PORT: '-1' },
    { DATA_DIR: '' },
    { DEFAULT_USER: '.hidden' },
    { DEFAULT_USER: 'a/b' },
  ])('rejects %j', (env) => {
    expect(() => loadConfig(env)).toThrow(ZodError);
  });
});
