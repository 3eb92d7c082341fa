/**
 * Dataset Loader
 *
 * Reads the five JSON tables from a data directory and validates each
 * against its zod schema. Reads are synchronous: lookups resolve inside
 * entity constructors.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import type * as z from 'zod';
import type { GeoDataset } from './types.js';
import { DataLoadError } from './errors.js';
import { tryCatchSync } from './result.js';
import {
  DivisionsFileSchema,
  DistrictsFileSchema,
  UpazilasFileSchema,
  UnionsFileSchema,
  PostcodesFileSchema,
  safeValidate,
} from './schemas/validation.js';

export const DATA_FILES = {
  divisions: 'divisions.json',
  districts: 'districts.json',
  upazilas: 'upazilas.json',
  unions: 'unions.json',
  postcodes: 'postcodes.json',
} as const;

/** Raw, unvalidated file contents keyed by table */
export type RawDataset = Record<keyof typeof DATA_FILES, unknown>;

function validateTable<T extends z.ZodType>(source: string, schema: T, raw: unknown): z.infer<T> {
  const result = safeValidate(schema, raw);
  if (!result.success) {
    throw new DataLoadError(
      source,
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Validate already-parsed file contents
 * @throws DataLoadError listing every schema issue of the first bad table
 */
export function parseDataset(raw: RawDataset): GeoDataset {
  return {
    divisions: validateTable(DATA_FILES.divisions, DivisionsFileSchema, raw.divisions).divisions,
    districts: validateTable(DATA_FILES.districts, DistrictsFileSchema, raw.districts).districts,
    upazilas: validateTable(DATA_FILES.upazilas, UpazilasFileSchema, raw.upazilas).upazilas,
    unions: validateTable(DATA_FILES.unions, UnionsFileSchema, raw.unions).unions,
    postcodes: validateTable(DATA_FILES.postcodes, PostcodesFileSchema, raw.postcodes).postcodes,
  };
}

function readJsonFile(dataDir: string, file: string): unknown {
  const path = join(dataDir, file);
  const result = tryCatchSync(
    (): unknown => JSON.parse(readFileSync(path, 'utf-8')),
    (e) => new DataLoadError(path, [e instanceof Error ? e.message : String(e)])
  );
  if (!result.ok) throw result.error;
  return result.value;
}

/**
 * Read and validate every table in `dataDir`
 * @throws DataLoadError if a file is missing, not JSON, or fails validation
 */
export function loadDataset(dataDir: string): GeoDataset {
  return parseDataset({
    divisions: readJsonFile(dataDir, DATA_FILES.divisions),
    districts: readJsonFile(dataDir, DATA_FILES.districts),
    upazilas: readJsonFile(dataDir, DATA_FILES.upazilas),
    unions: readJsonFile(dataDir, DATA_FILES.unions),
    postcodes: readJsonFile(dataDir, DATA_FILES.postcodes),
  });
}
