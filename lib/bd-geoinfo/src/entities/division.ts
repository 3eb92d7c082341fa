/**
 * Bangladesh Divisions
 *
 * @example
 * const div = new Division('Dhaka');
 * if (div.hasDivision()) {
 *   div.getName(true);        // "ঢাকা"
 *   div.getArea('mile');
 *   div.getDistricts();
 * }
 */

import type { DivisionRecord } from '../types.js';
import type { GeoIndex } from '../geo-index.js';
import type { GeoNotFoundError } from '../errors.js';
import type { Result } from '../result.js';
import { getGeoIndex } from '../config.js';
import { ProfiledEntity, type GeoStats } from './base.js';

export class Division extends ProfiledEntity<DivisionRecord> {
  constructor(name: string, index?: GeoIndex) {
    super('division', name, index);
  }

  static find(name: string, index?: GeoIndex): Result<Division, GeoNotFoundError> {
    return new Division(name, index).toResult();
  }

  static all(index: GeoIndex = getGeoIndex()): readonly DivisionRecord[] {
    return index.dataset.divisions;
  }

  static names(bn = false, index: GeoIndex = getGeoIndex()): string[] {
    return index.dataset.divisions.map(d => (bn ? d.nameLocal : d.name));
  }

  protected resolve(query: string): DivisionRecord | undefined {
    return this.index.findDivision(query);
  }

  hasDivision(): boolean {
    return this.exists();
  }

  /** Names of the division's districts, in dataset order */
  getDistricts(bn = false): string[] {
    if (!this.record) return [];
    return this.index.districtsOf(this.record.id).map(d => (bn ? d.nameLocal : d.name));
  }

  /** Civic figures plus the number of districts in the dataset */
  getStats(): (GeoStats & { districtsCount: number }) | null {
    const stats = super.getStats();
    if (!stats || !this.record) return null;
    return { ...stats, districtsCount: this.index.districtsOf(this.record.id).length };
  }

  getDivisionData(): DivisionRecord | null {
    return this.record ?? null;
  }
}
