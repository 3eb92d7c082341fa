/**
 * Lookup handle base classes
 *
 * A handle resolves its query once, in the constructor, and keeps the
 * matched record (or nothing). Accessors on an unresolved handle return
 * sentinels ("" / 0 / [] / null) instead of throwing.
 */

import type { AreaUnit, EntityKind, NamedRecord } from '../types.js';
import type { GeoIndex } from '../geo-index.js';
import { GeoNotFoundError } from '../errors.js';
import { ok, err, type Result } from '../result.js';
import { getGeoIndex } from '../config.js';

/** km² → mi² */
export const SQ_MILES_PER_SQ_KM = 0.386102;

export abstract class GeoEntity<TRecord extends NamedRecord> {
  readonly kind: EntityKind;
  /** Trimmed query the handle was built from */
  readonly query: string;
  protected readonly index: GeoIndex;
  protected readonly record: TRecord | undefined;

  protected constructor(kind: EntityKind, query: string, index: GeoIndex = getGeoIndex()) {
    this.kind = kind;
    this.query = query.trim();
    this.index = index;
    this.record = this.query ? this.resolve(this.query) : undefined;
  }

  protected abstract resolve(query: string): TRecord | undefined;

  exists(): boolean {
    return this.record !== undefined;
  }

  getName(bn = false): string {
    if (!this.record) return '';
    return bn ? this.record.nameLocal : this.record.name;
  }

  toResult(): Result<this, GeoNotFoundError> {
    return this.record ? ok(this) : err(new GeoNotFoundError(this.kind, this.query));
  }

  toJSON(): TRecord | null {
    return this.record ?? null;
  }
}

export interface CensusRecord extends NamedRecord {
  id: number;
  areaKm2?: number;
  population?: number;
  populationYear?: number;
  lat?: number;
  long?: number;
  headquarter?: string;
}

/**
 * Divisions, districts and upazilas: records with an ID, area,
 * population and coordinates
 */
export abstract class CensusEntity<TRecord extends CensusRecord> extends GeoEntity<TRecord> {
  getId(): number | null {
    return this.record?.id ?? null;
  }

  /**
   * Area in km², or mi² rounded to 2 decimals
   */
  getArea(unit: AreaUnit = 'km'): number {
    const areaKm2 = this.record?.areaKm2;
    if (areaKm2 === undefined) return 0;
    if (unit === 'mile') return Math.round(areaKm2 * SQ_MILES_PER_SQ_KM * 100) / 100;
    return areaKm2;
  }

  getPopulation(): number {
    return this.record?.population ?? 0;
  }

  getPopulationYear(): number | null {
    return this.record?.populationYear ?? null;
  }

  /** [lat, long], or [] when the record has no coordinates */
  getLatLong(): [number, number] | [] {
    const lat = this.record?.lat;
    const long = this.record?.long;
    if (lat === undefined || long === undefined) return [];
    return [lat, long];
  }

  /** "map:lat,long", renderable by the terminal presenter */
  getMap(): string {
    const latLong = this.getLatLong();
    if (latLong.length === 0) return '';
    return `map:${latLong[0]},${latLong[1]}`;
  }

  getHeadquarter(): string {
    return this.record?.headquarter ?? '';
  }
}

export interface ProfileRecord extends CensusRecord {
  website?: string;
  literacyRate?: number;
  hospitalsCount?: number;
  schoolsCount?: number;
  policeStations?: number;
  courts?: number;
  voterPopulation?: number;
  pollingCenters?: number;
  avgTempCelsius?: number;
  avgRainfallMm?: number;
  weatherZone?: string;
  touristSpots?: readonly string[];
  festivals?: readonly string[];
  culturalHeritage?: readonly string[];
  notes?: string;
}

/** Civic figures; `null` where the record has no value */
export interface GeoStats {
  literacyRate: number | null;
  hospitalsCount: number | null;
  schoolsCount: number | null;
  policeStations: number | null;
  courts: number | null;
  voterPopulation: number | null;
  pollingCenters: number | null;
}

export interface GeoWeather {
  avgTempCelsius: number | null;
  avgRainfallMm: number | null;
  weatherZone: string | null;
}

/**
 * Divisions and districts: census figures plus website, civic stats,
 * climate and culture
 */
export abstract class ProfiledEntity<TRecord extends ProfileRecord> extends CensusEntity<TRecord> {
  getWebsite(): string {
    return this.record?.website ?? '';
  }

  /** `null` when unresolved */
  getStats(): GeoStats | null {
    const r = this.record;
    if (!r) return null;
    return {
      literacyRate: r.literacyRate ?? null,
      hospitalsCount: r.hospitalsCount ?? null,
      schoolsCount: r.schoolsCount ?? null,
      policeStations: r.policeStations ?? null,
      courts: r.courts ?? null,
      voterPopulation: r.voterPopulation ?? null,
      pollingCenters: r.pollingCenters ?? null,
    };
  }

  getWeather(): GeoWeather | null {
    const r = this.record;
    if (!r) return null;
    return {
      avgTempCelsius: r.avgTempCelsius ?? null,
      avgRainfallMm: r.avgRainfallMm ?? null,
      weatherZone: r.weatherZone ?? null,
    };
  }

  getTouristSpots(): string[] {
    return [...(this.record?.touristSpots ?? [])];
  }

  getFestivals(): string[] {
    return [...(this.record?.festivals ?? [])];
  }

  getCulturalHeritage(): string[] {
    return [...(this.record?.culturalHeritage ?? [])];
  }

  getNotes(): string {
    return this.record?.notes ?? '';
  }
}

/**
 * Join address parts, most specific first
 */
export function joinAddress(parts: readonly string[]): string {
  return parts.filter(Boolean).join(', ');
}
