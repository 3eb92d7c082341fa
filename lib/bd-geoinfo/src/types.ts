/**
 * BD GeoInfo Types
 *
 * Record types are inferred from the zod schemas in ./schemas/validation.ts
 */

import type {
  DivisionRecord,
  DistrictRecord,
  UpazilaRecord,
  UnionRecord,
  PostcodeRecord,
} from './schemas/validation.js';

export type {
  DivisionRecord,
  DistrictRecord,
  UpazilaRecord,
  UnionRecord,
  PostcodeRecord,
};

/** Entity kinds the lookup service resolves */
export type EntityKind = 'division' | 'district' | 'upazila' | 'union' | 'postcode';

/** Unit accepted by `getArea()` */
export type AreaUnit = 'km' | 'mile';

/** Anything with an English and a Bangla name */
export interface NamedRecord {
  name: string;
  nameLocal: string;
}

/**
 * Complete dataset as read from the data directory
 */
export interface GeoDataset {
  divisions: readonly DivisionRecord[];
  districts: readonly DistrictRecord[];
  upazilas: readonly UpazilaRecord[];
  unions: readonly UnionRecord[];
  postcodes: readonly PostcodeRecord[];
}

/** Logger interface */
export interface Logger {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  log?(...args: unknown[]): void;
}

/** Name matching options */
export interface MatchOptions {
  /** Compare English names case-sensitively (default: false) */
  caseSensitive?: boolean;
}

/** Library configuration */
export interface GeoInfoConfig extends MatchOptions {
  /** Directory holding divisions.json, districts.json, upazilas.json, unions.json, postcodes.json */
  dataDir: string;
  /** Custom logger (defaults to console) */
  logger?: Logger;
}
