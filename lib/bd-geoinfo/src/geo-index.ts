/**
 * Geo Index
 *
 * Built once per dataset: ID maps, name maps and ordered child lists,
 * so lookups and parent/child walks never rescan the tables.
 *
 * Name keys: English names are lowercased unless `caseSensitive` is set,
 * Bangla names are kept as-is. When two records share a key the first one
 * in dataset order wins.
 */

import type {
  DivisionRecord,
  DistrictRecord,
  UpazilaRecord,
  UnionRecord,
  PostcodeRecord,
  GeoDataset,
  MatchOptions,
  NamedRecord,
} from './types.js';
import { DataLoadError } from './errors.js';
import { logger } from './logger.js';

export interface GeoIndexStats {
  divisions: number;
  districts: number;
  upazilas: number;
  unions: number;
  postcodes: number;
}

export class GeoIndex {
  readonly dataset: GeoDataset;
  readonly caseSensitive: boolean;

  private divisionsById = new Map<number, DivisionRecord>();
  private districtsById = new Map<number, DistrictRecord>();
  private upazilasById = new Map<number, UpazilaRecord>();

  private divisionsByName = new Map<string, DivisionRecord>();
  private districtsByName = new Map<string, DistrictRecord>();
  private upazilasByName = new Map<string, UpazilaRecord>();
  private unionsByName = new Map<string, UnionRecord>();
  private postcodesByName = new Map<string, PostcodeRecord>();
  private postcodesByCode = new Map<string, PostcodeRecord>();

  private districtsByDivision = new Map<number, DistrictRecord[]>();
  private upazilasByDistrict = new Map<number, UpazilaRecord[]>();
  private unionsByUpazila = new Map<number, UnionRecord[]>();

  /**
   * @throws DataLoadError on duplicate IDs or dangling parent IDs
   */
  constructor(dataset: GeoDataset, options: MatchOptions = {}) {
    this.caseSensitive = options.caseSensitive ?? false;
    this.dataset = Object.freeze({
      divisions: freezeAll(dataset.divisions),
      districts: freezeAll(dataset.districts),
      upazilas: freezeAll(dataset.upazilas),
      unions: freezeAll(dataset.unions),
      postcodes: freezeAll(dataset.postcodes),
    });

    this.indexIds('divisions', this.dataset.divisions, this.divisionsById);
    this.indexIds('districts', this.dataset.districts, this.districtsById);
    this.indexIds('upazilas', this.dataset.upazilas, this.upazilasById);

    this.linkChildren('districts', this.dataset.districts, d => d.divisionId, this.divisionsById, this.districtsByDivision);
    this.linkChildren('upazilas', this.dataset.upazilas, u => u.districtId, this.districtsById, this.upazilasByDistrict);
    this.linkChildren('unions', this.dataset.unions, u => u.upazilaId, this.upazilasById, this.unionsByUpazila);

    this.indexNames(this.dataset.divisions, this.divisionsByName);
    this.indexNames(this.dataset.districts, this.districtsByName);
    this.indexNames(this.dataset.upazilas, this.upazilasByName);
    this.indexNames(this.dataset.unions, this.unionsByName);
    this.indexNames(this.dataset.postcodes, this.postcodesByName);
    for (const record of this.dataset.postcodes) {
      if (!this.postcodesByCode.has(record.postcode)) {
        this.postcodesByCode.set(record.postcode, record);
      }
    }

    this.checkDeclaredCounts();
  }

  /**
   * Normalize a name or query into a lookup key
   */
  normalize(name: string): string {
    const trimmed = name.trim();
    return this.caseSensitive ? trimmed : trimmed.toLowerCase();
  }

  /**
   * True if `query` is the record's English or Bangla name
   */
  matches(record: NamedRecord, query: string): boolean {
    return this.normalize(record.name) === this.normalize(query) || record.nameLocal === query.trim();
  }

  // ============ LOOKUPS ============

  findDivision(query: string): DivisionRecord | undefined {
    return this.divisionsByName.get(this.normalize(query));
  }

  findDistrict(query: string): DistrictRecord | undefined {
    return this.districtsByName.get(this.normalize(query));
  }

  /**
   * Find an upazila, optionally only among one district's upazilas
   */
  findUpazila(query: string, districtId?: number): UpazilaRecord | undefined {
    if (districtId === undefined) {
      return this.upazilasByName.get(this.normalize(query));
    }
    return this.upazilasOf(districtId).find(u => this.matches(u, query));
  }

  findUnion(query: string): UnionRecord | undefined {
    return this.unionsByName.get(this.normalize(query));
  }

  /**
   * Match by postcode first, then by area name
   */
  findPostcode(query: string): PostcodeRecord | undefined {
    return this.postcodesByCode.get(query.trim()) ?? this.postcodesByName.get(this.normalize(query));
  }

  // ============ HIERARCHY ============

  divisionById(id: number): DivisionRecord | undefined {
    return this.divisionsById.get(id);
  }

  districtById(id: number): DistrictRecord | undefined {
    return this.districtsById.get(id);
  }

  upazilaById(id: number): UpazilaRecord | undefined {
    return this.upazilasById.get(id);
  }

  districtsOf(divisionId: number): readonly DistrictRecord[] {
    return this.districtsByDivision.get(divisionId) ?? [];
  }

  upazilasOf(districtId: number): readonly UpazilaRecord[] {
    return this.upazilasByDistrict.get(districtId) ?? [];
  }

  unionsOf(upazilaId: number): readonly UnionRecord[] {
    return this.unionsByUpazila.get(upazilaId) ?? [];
  }

  stats(): GeoIndexStats {
    return {
      divisions: this.dataset.divisions.length,
      districts: this.dataset.districts.length,
      upazilas: this.dataset.upazilas.length,
      unions: this.dataset.unions.length,
      postcodes: this.dataset.postcodes.length,
    };
  }

  // ============ BUILD HELPERS ============

  private indexIds<T extends { id: number }>(
    table: string,
    records: readonly T[],
    target: Map<number, T>
  ): void {
    const errors: string[] = [];
    for (const record of records) {
      if (target.has(record.id)) {
        errors.push(`duplicate id ${record.id}`);
        continue;
      }
      target.set(record.id, record);
    }
    if (errors.length) throw new DataLoadError(table, errors);
  }

  private linkChildren<C extends NamedRecord, P>(
    table: string,
    children: readonly C[],
    parentIdOf: (child: C) => number,
    parents: Map<number, P>,
    target: Map<number, C[]>
  ): void {
    const errors: string[] = [];
    for (const child of children) {
      const parentId = parentIdOf(child);
      if (!parents.has(parentId)) {
        errors.push(`"${child.name}" references missing parent id ${parentId}`);
        continue;
      }
      const siblings = target.get(parentId);
      if (siblings) siblings.push(child);
      else target.set(parentId, [child]);
    }
    if (errors.length) throw new DataLoadError(table, errors);
  }

  private indexNames<T extends NamedRecord>(records: readonly T[], target: Map<string, T>): void {
    for (const record of records) {
      for (const key of [this.normalize(record.name), record.nameLocal]) {
        if (!target.has(key)) target.set(key, record);
      }
    }
  }

  private checkDeclaredCounts(): void {
    for (const district of this.dataset.districts) {
      const present = this.upazilasOf(district.id).length;
      if (district.upazilasCount !== undefined && present > district.upazilasCount) {
        logger.warn(`District "${district.name}" declares ${district.upazilasCount} upazilas but ${present} are present`);
      }
    }
    for (const upazila of this.dataset.upazilas) {
      const present = this.unionsOf(upazila.id).length;
      if (upazila.unionsCount !== undefined && present > upazila.unionsCount) {
        logger.warn(`Upazila "${upazila.name}" declares ${upazila.unionsCount} unions but ${present} are present`);
      }
    }
  }
}

function freezeAll<T extends object>(records: readonly T[]): readonly T[] {
  return Object.freeze(records.map(record => Object.freeze({ ...record })));
}

/**
 * Build an index from in-memory records
 */
export function buildGeoIndex(dataset: GeoDataset, options: MatchOptions = {}): GeoIndex {
  return new GeoIndex(dataset, options);
}
