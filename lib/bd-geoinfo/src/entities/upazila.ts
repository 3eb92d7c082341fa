/**
 * Bangladesh Upazilas (sub-districts)
 *
 * Upazila names repeat across districts (e.g. Pirganj); a bare name
 * resolves to the first match in dataset order.
 */

import type { DistrictRecord, UpazilaRecord } from '../types.js';
import type { GeoIndex } from '../geo-index.js';
import type { GeoNotFoundError } from '../errors.js';
import type { Result } from '../result.js';
import { getGeoIndex } from '../config.js';
import { CensusEntity } from './base.js';

export class Upazila extends CensusEntity<UpazilaRecord> {
  constructor(name: string, index?: GeoIndex) {
    super('upazila', name, index);
  }

  static find(name: string, index?: GeoIndex): Result<Upazila, GeoNotFoundError> {
    return new Upazila(name, index).toResult();
  }

  static all(index: GeoIndex = getGeoIndex()): readonly UpazilaRecord[] {
    return index.dataset.upazilas;
  }

  static names(bn = false, index: GeoIndex = getGeoIndex()): string[] {
    return index.dataset.upazilas.map(u => (bn ? u.nameLocal : u.name));
  }

  protected resolve(query: string): UpazilaRecord | undefined {
    return this.index.findUpazila(query);
  }

  private districtRecord(): DistrictRecord | undefined {
    return this.record && this.index.districtById(this.record.districtId);
  }

  hasUpazila(): boolean {
    return this.exists();
  }

  getDistrict(bn = false): string {
    const district = this.districtRecord();
    if (!district) return '';
    return bn ? district.nameLocal : district.name;
  }

  getDivision(bn = false): string {
    const district = this.districtRecord();
    const division = district && this.index.divisionById(district.divisionId);
    if (!division) return '';
    return bn ? division.nameLocal : division.name;
  }

  getUnions(bn = false): string[] {
    if (!this.record) return [];
    return this.index.unionsOf(this.record.id).map(u => (bn ? u.nameLocal : u.name));
  }

  getUnionsCount(): number {
    if (!this.record) return 0;
    return this.record.unionsCount ?? this.index.unionsOf(this.record.id).length;
  }

  getUpazilaData(): UpazilaRecord | null {
    return this.record ?? null;
  }
}
