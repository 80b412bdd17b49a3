/**
 * Public API of the region list library.
 */

export { getRegionList, type RegionListDependencies } from './core/regionList';
export { enumerateRegions, usableRegions } from './core/regionEnumerator';
export { fetchRegionDetail, fetchRegionDetails, locationParameterName } from './core/detailFetcher';
export { assemble, buildFilterSpec, selectRegionNames, shapeResult } from './core/assembler';
export { createRegionClients, type RegionClients, type RegionClientOptions } from './core/clients';
export {
  loadSettings,
  parseRegionListOptions,
  RegionListOptionsSchema,
  DEFAULT_LOCATION_PARAMETER_TEMPLATE,
  type RegionListOptions,
  type RegionListOptionsInput,
} from './core/config';
export {
  RegionListingError,
  InvalidRegionOptionsError,
  RegionListingConfigError,
} from './shared/errors';
export type {
  DetailMap,
  DetailOutcome,
  EnumeratedRegion,
  FilterSpec,
  OptInStatus,
  RegionListResult,
  RegionListSettings,
  RegionRecord,
} from './shared/types';
