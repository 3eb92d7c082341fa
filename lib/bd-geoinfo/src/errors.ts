/**
 * BD GeoInfo Error Classes
 */

import type { EntityKind } from './types.js';

/**
 * Base error class for the library
 */
export class GeoError extends Error {
  code: string;
  details: Record<string, unknown>;

  constructor(message: string, code: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'GeoError';
    this.code = code;
    this.details = details;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Lookup matched no record. Only ever carried inside an `Err` result;
 * lookups themselves do not throw.
 */
export class GeoNotFoundError extends GeoError {
  kind: EntityKind;
  query: string;

  constructor(kind: EntityKind, query: string) {
    super(
      `No ${kind} matches "${query}"`,
      'NOT_FOUND',
      { kind, query }
    );
    this.name = 'GeoNotFoundError';
    this.kind = kind;
    this.query = query;
  }
}

/**
 * A data file is missing, unreadable, fails its schema,
 * or references a parent that does not exist
 */
export class DataLoadError extends GeoError {
  source: string;
  errors: string[];

  constructor(source: string, errors: string[]) {
    const message = [
      `Failed to load geo data from ${source}:`,
      ...errors.map(e => `  - ${e}`),
    ].join('\n');

    super(message, 'DATA_LOAD_ERROR', { source, errors });
    this.name = 'DataLoadError';
    this.source = source;
    this.errors = errors;
  }
}
