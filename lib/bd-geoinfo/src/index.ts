/**
 * BD GeoInfo - Bangladesh geographical lookups
 *
 * Divisions, districts, upazilas, unions and postcodes by English or
 * Bangla name, plus a small terminal presenter for printing results.
 *
 * @example Lookups:
 * import { District, Postcode } from 'bd-geoinfo';
 *
 * const dist = new District('সিলেট');
 * dist.hasDistrict();          // true
 * dist.getDivision();          // "Sylhet"
 * new Postcode('8710').getFullAddress();
 *
 * @example Explicit results:
 * const res = District.find('Sylhet');
 * if (res.ok) res.value.getUpazilas();
 *
 * @example Presenter:
 * import { addToTerminal, showTerminal } from 'bd-geoinfo';
 * addToTerminal(new District('Sylhet'));
 * showTerminal();
 *
 * @module bd-geoinfo
 */

export type {
  DivisionRecord,
  DistrictRecord,
  UpazilaRecord,
  UnionRecord,
  PostcodeRecord,
  EntityKind,
  AreaUnit,
  NamedRecord,
  GeoDataset,
  Logger,
  MatchOptions,
  GeoInfoConfig,
} from './types.js';

// Entities
export { GeoEntity, CensusEntity, ProfiledEntity, SQ_MILES_PER_SQ_KM } from './entities/base.js';
export type { CensusRecord, ProfileRecord, GeoStats, GeoWeather } from './entities/base.js';
export { Division } from './entities/division.js';
export { District } from './entities/district.js';
export { Upazila } from './entities/upazila.js';
export { Union } from './entities/union.js';
export { Postcode } from './entities/postcode.js';

// Data
export { GeoIndex, buildGeoIndex } from './geo-index.js';
export type { GeoIndexStats } from './geo-index.js';
export { loadDataset, parseDataset, DATA_FILES } from './dataset.js';
export type { RawDataset } from './dataset.js';

// Configuration
export {
  configure,
  getConfig,
  resetConfig,
  createGeoIndex,
  getGeoIndex,
  BUNDLED_DATA_DIR,
} from './config.js';
export type { GeoIndexConfig } from './config.js';

// Presenter
export {
  Terminal,
  addToTerminal,
  clearFromTerminal,
  showTerminal,
  getDefaultTerminal,
  formatContent,
  formatTimestamp,
} from './terminal.js';
export type { TerminalContent, TerminalOptions, TerminalOutput } from './terminal.js';

// Errors & results
export { GeoError, GeoNotFoundError, DataLoadError } from './errors.js';
export { Result, ok, err, isOk, isErr, unwrap, unwrapOr, map, match } from './result.js';
export type { Ok, Err } from './result.js';

// Logging
export { logger, setLogger } from './logger.js';
