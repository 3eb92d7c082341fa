/**
 * Bangladesh Unions (rural councils)
 *
 * @example
 * const uni = new Union('Burirchar');
 * uni.getFullAddress();      // "Burirchar, Barguna Sadar, Barguna, Barishal"
 * uni.getFullAddress(true);  // "বুড়িরচর, বরগুনা সদর, বরগুনা, বরিশাল"
 */

import type { DivisionRecord, DistrictRecord, UnionRecord, UpazilaRecord, NamedRecord } from '../types.js';
import type { GeoIndex } from '../geo-index.js';
import type { GeoNotFoundError } from '../errors.js';
import type { Result } from '../result.js';
import { getGeoIndex } from '../config.js';
import { GeoEntity, joinAddress } from './base.js';

interface UnionAncestors {
  upazila?: UpazilaRecord;
  district?: DistrictRecord;
  division?: DivisionRecord;
}

function nameOf(record: NamedRecord | undefined, bn: boolean): string {
  if (!record) return '';
  return bn ? record.nameLocal : record.name;
}

export class Union extends GeoEntity<UnionRecord> {
  constructor(name: string, index?: GeoIndex) {
    super('union', name, index);
  }

  static find(name: string, index?: GeoIndex): Result<Union, GeoNotFoundError> {
    return new Union(name, index).toResult();
  }

  static all(index: GeoIndex = getGeoIndex()): readonly UnionRecord[] {
    return index.dataset.unions;
  }

  static names(bn = false, index: GeoIndex = getGeoIndex()): string[] {
    return index.dataset.unions.map(u => (bn ? u.nameLocal : u.name));
  }

  protected resolve(query: string): UnionRecord | undefined {
    return this.index.findUnion(query);
  }

  private ancestors(): UnionAncestors {
    const upazila = this.record && this.index.upazilaById(this.record.upazilaId);
    const district = upazila && this.index.districtById(upazila.districtId);
    const division = district && this.index.divisionById(district.divisionId);
    return { upazila, district, division };
  }

  hasUnion(): boolean {
    return this.exists();
  }

  getId(): number | null {
    return this.record?.id ?? null;
  }

  getUpazila(bn = false): string {
    return nameOf(this.ancestors().upazila, bn);
  }

  getDistrict(bn = false): string {
    return nameOf(this.ancestors().district, bn);
  }

  getDivision(bn = false): string {
    return nameOf(this.ancestors().division, bn);
  }

  /**
   * "Union, Upazila, District, Division"
   */
  getFullAddress(bn = false): string {
    if (!this.record) return '';
    const { upazila, district, division } = this.ancestors();
    return joinAddress([
      nameOf(this.record, bn),
      nameOf(upazila, bn),
      nameOf(district, bn),
      nameOf(division, bn),
    ]);
  }

  getUnionData(): UnionRecord | null {
    return this.record ?? null;
  }
}
