/**
 * Bangladesh Postcodes
 *
 * The postcode table is flat: each row names its upazila, district and
 * division in English. Bangla names are looked up in the index; a name
 * the index does not know falls back to the English one on record.
 *
 * @example
 * const p = new Postcode('8710');
 * p.getUpazila();        // "Amtali"
 * p.getFullAddress();    // "Amtali, Amtali, Barguna, Barishal, 8710"
 */

import type { PostcodeRecord } from '../types.js';
import type { GeoIndex } from '../geo-index.js';
import type { GeoNotFoundError } from '../errors.js';
import type { Result } from '../result.js';
import { getGeoIndex } from '../config.js';
import { GeoEntity, joinAddress } from './base.js';

export class Postcode extends GeoEntity<PostcodeRecord> {
  /**
   * @param code - 4-digit postcode, or the area's English or Bangla name
   */
  constructor(code: string, index?: GeoIndex) {
    super('postcode', code, index);
  }

  static find(code: string, index?: GeoIndex): Result<Postcode, GeoNotFoundError> {
    return new Postcode(code, index).toResult();
  }

  static all(index: GeoIndex = getGeoIndex()): readonly PostcodeRecord[] {
    return index.dataset.postcodes;
  }

  static codes(index: GeoIndex = getGeoIndex()): string[] {
    return index.dataset.postcodes.map(p => p.postcode);
  }

  protected resolve(query: string): PostcodeRecord | undefined {
    return this.index.findPostcode(query);
  }

  hasPostcode(): boolean {
    return this.exists();
  }

  getPostcode(): string {
    return this.record?.postcode ?? '';
  }

  getUpazila(bn = false): string {
    if (!this.record) return '';
    if (!bn) return this.record.upazila;
    const district = this.index.findDistrict(this.record.district);
    if (!district) return this.record.upazila;
    const upazila = this.index.findUpazila(this.record.upazila, district.id);
    return upazila?.nameLocal ?? this.record.upazila;
  }

  getDistrict(bn = false): string {
    if (!this.record) return '';
    if (!bn) return this.record.district;
    return this.index.findDistrict(this.record.district)?.nameLocal ?? this.record.district;
  }

  getDivision(bn = false): string {
    if (!this.record) return '';
    if (!bn) return this.record.division;
    return this.index.findDivision(this.record.division)?.nameLocal ?? this.record.division;
  }

  /**
   * "Area, Upazila, District, Division, Code"
   */
  getFullAddress(bn = false): string {
    if (!this.record) return '';
    return joinAddress([
      this.getName(bn),
      this.getUpazila(bn),
      this.getDistrict(bn),
      this.getDivision(bn),
      this.record.postcode,
    ]);
  }

  getPostcodeData(): PostcodeRecord | null {
    return this.record ?? null;
  }
}
