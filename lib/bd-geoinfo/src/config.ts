/**
 * BD GeoInfo Configuration
 *
 * Holds the process-wide config and the lazily built default index.
 * `configure()` merges options into the defaults and drops the cached
 * index so the next lookup reloads from the new settings.
 */

import { fileURLToPath } from 'url';
import type { GeoInfoConfig, MatchOptions } from './types.js';
import { GeoIndex } from './geo-index.js';
import { loadDataset } from './dataset.js';
import { logger, setLogger } from './logger.js';

/** Data directory shipped with the package */
export const BUNDLED_DATA_DIR = fileURLToPath(new URL('../data/', import.meta.url));

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: GeoInfoConfig = {
  dataDir: BUNDLED_DATA_DIR,
  caseSensitive: false,
};

let _config: GeoInfoConfig = { ...DEFAULT_CONFIG };
let _index: GeoIndex | null = null;

/**
 * Merge user config with defaults
 */
export function mergeConfig(config: Partial<GeoInfoConfig> = {}): GeoInfoConfig {
  return {
    ...DEFAULT_CONFIG,
    ...config,
    dataDir: config.dataDir ?? DEFAULT_CONFIG.dataDir,
  };
}

/**
 * Replace the active configuration
 */
export function configure(config: Partial<GeoInfoConfig>): GeoInfoConfig {
  _config = mergeConfig({ ..._config, ...config });
  if (config.logger) setLogger(config.logger);
  _index = null;
  return _config;
}

export function getConfig(): Readonly<GeoInfoConfig> {
  return _config;
}

/**
 * Restore defaults (the logger is left as is)
 */
export function resetConfig(): void {
  _config = { ...DEFAULT_CONFIG };
  _index = null;
}

/** Settings that shape an index; the logger is process-wide */
export type GeoIndexConfig = Partial<Omit<GeoInfoConfig, 'logger'>>;

/**
 * Load a dataset and build an index that is independent of the
 * process-wide one
 */
export function createGeoIndex(config: GeoIndexConfig = {}): GeoIndex {
  const { dataDir, caseSensitive } = mergeConfig(config);
  const options: MatchOptions = { caseSensitive };
  const index = new GeoIndex(loadDataset(dataDir), options);
  logger.debug(`Loaded geo dataset from ${dataDir}`, index.stats());
  return index;
}

/**
 * Process-wide index, built on first use
 */
export function getGeoIndex(): GeoIndex {
  if (!_index) {
    _index = createGeoIndex(_config);
  }
  return _index;
}
