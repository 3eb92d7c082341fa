import { describe, it, expect, vi, afterEach } from 'vitest';
import { join } from 'path';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import * as z from 'zod';
import {
  configure,
  getConfig,
  resetConfig,
  mergeConfig,
  createGeoIndex,
  getGeoIndex,
  DEFAULT_CONFIG,
  BUNDLED_DATA_DIR,
} from './config.js';
import { Division } from './entities/division.js';
import { DataLoadError } from './errors.js';
import { setLogger } from './logger.js';

describe('config', () => {
  afterEach(() => {
    resetConfig();
    setLogger(console);
  });

  it('defaults to the bundled data and case-insensitive names', () => {
    expect(getConfig()).toEqual({ dataDir: BUNDLED_DATA_DIR, caseSensitive: false });
    expect(mergeConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('keeps the data directory beside src, where the build copies it', () => {
    expect(BUNDLED_DATA_DIR).toBe(fileURLToPath(new URL('../data/', import.meta.url)));

    const rootPackage = z
      .object({ scripts: z.object({ build: z.string() }) })
      .parse(JSON.parse(readFileSync(new URL('../../../package.json', import.meta.url), 'utf-8')));
    expect(rootPackage.scripts.build).toBe(
      'tsc -p tsconfig.build.json && cp -R lib/bd-geoinfo/data dist/bd-geoinfo/'
    );
  });

  it('caches the process-wide index until reconfigured', () => {
    const first = getGeoIndex();
    expect(getGeoIndex()).toBe(first);

    configure({ caseSensitive: false });
    expect(getGeoIndex()).not.toBe(first);
  });

  it('applies caseSensitive to new lookups', () => {
    configure({ caseSensitive: true });

    expect(new Division('dhaka').hasDivision()).toBe(false);
    expect(new Division('Dhaka').hasDivision()).toBe(true);

    resetConfig();
    expect(new Division('dhaka').hasDivision()).toBe(true);
  });

  it('surfaces a bad data directory when the index is built', () => {
    configure({ dataDir: join(BUNDLED_DATA_DIR, 'missing') });

    expect(() => getGeoIndex()).toThrow(DataLoadError);
  });

  it('installs a custom logger and logs each load', () => {
    const debug = vi.fn();
    configure({ logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug } });

    const index = createGeoIndex();

    expect(debug).toHaveBeenCalledWith(
      '[bd-geoinfo] DEBUG:',
      `Loaded geo dataset from ${BUNDLED_DATA_DIR}`,
      index.stats()
    );
  });

  it('builds independent indexes without touching the shared one', () => {
    const shared = getGeoIndex();
    const strict = createGeoIndex({ caseSensitive: true });

    expect(strict).not.toBe(shared);
    expect(strict.findDivision('sylhet')).toBeUndefined();
    expect(shared.findDivision('sylhet')?.name).toBe('Sylhet');
  });
});
