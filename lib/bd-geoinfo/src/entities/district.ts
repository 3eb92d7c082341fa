/**
 * Bangladesh Districts
 */

import type { DistrictRecord } from '../types.js';
import type { GeoIndex } from '../geo-index.js';
import type { GeoNotFoundError } from '../errors.js';
import type { Result } from '../result.js';
import { getGeoIndex } from '../config.js';
import { ProfiledEntity } from './base.js';

export class District extends ProfiledEntity<DistrictRecord> {
  constructor(name: string, index?: GeoIndex) {
    super('district', name, index);
  }

  static find(name: string, index?: GeoIndex): Result<District, GeoNotFoundError> {
    return new District(name, index).toResult();
  }

  static all(index: GeoIndex = getGeoIndex()): readonly DistrictRecord[] {
    return index.dataset.districts;
  }

  static names(bn = false, index: GeoIndex = getGeoIndex()): string[] {
    return index.dataset.districts.map(d => (bn ? d.nameLocal : d.name));
  }

  protected resolve(query: string): DistrictRecord | undefined {
    return this.index.findDistrict(query);
  }

  hasDistrict(): boolean {
    return this.exists();
  }

  getDivision(bn = false): string {
    if (!this.record) return '';
    const division = this.index.divisionById(this.record.divisionId);
    if (!division) return '';
    return bn ? division.nameLocal : division.name;
  }

  getUpazilas(bn = false): string[] {
    if (!this.record) return [];
    return this.index.upazilasOf(this.record.id).map(u => (bn ? u.nameLocal : u.name));
  }

  /**
   * Official count when the record declares one, otherwise the number
   * of upazilas in the dataset
   */
  getUpazilasCount(): number {
    if (!this.record) return 0;
    return this.record.upazilasCount ?? this.index.upazilasOf(this.record.id).length;
  }

  /** "YYYY-MM-DD", or "" when unknown */
  getEstablishedDate(): string {
    return this.record?.established ?? '';
  }

  getDistrictData(): DistrictRecord | null {
    return this.record ?? null;
  }
}
