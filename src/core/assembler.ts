/**
 * Filtering, sorting and shaping of the region list.
 *
 * Pure functions: no AWS calls, no state.
 */

import type {
  DetailMap,
  FilterSpec,
  OptInStatus,
  RegionListResult,
  RegionRecord,
} from '@shared/types';
import { RegionListingError } from '@shared/errors';

export interface SelectionInput {
  usableNames: Iterable<string>;
  optInByName: ReadonlyMap<string, OptInStatus>;
  filter: FilterSpec;
  allRegions: boolean;
}

export interface AssembleInput extends SelectionInput {
  detailMap: DetailMap;
  detailsRequested: boolean;
}

/**
 * Builds a FilterSpec from optional include/exclude lists.
 */
export function buildFilterSpec(includeList?: readonly string[], excludeList?: readonly string[]): FilterSpec {
  return {
    includeSet: new Set(includeList ?? []),
    excludeSet: new Set(excludeList ?? []),
  };
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function statusOf(name: string, optInByName: ReadonlyMap<string, OptInStatus>): OptInStatus {
  const status = optInByName.get(name);
  if (!status) {
    throw new RegionListingError(`No opt-in status recorded for region ${name}`);
  }
  return status;
}

/**
 * Applies candidate narrowing and include/exclude filters, then sorts.
 *
 * With `allRegions` false only regions with status `opted-in` remain;
 * regions enabled by default are dropped. Exclude always wins over include.
 *
 * @returns Distinct names in ascending order
 * @throws {RegionListingError} If a usable name has no opt-in status
 */
export function selectRegionNames(input: SelectionInput): string[] {
  const { usableNames, optInByName, filter, allRegions } = input;
  const selected = new Set<string>();

  for (const name of usableNames) {
    const status = statusOf(name, optInByName);

    if (!allRegions && status !== 'opted-in') continue;
    if (filter.includeSet.size > 0 && !filter.includeSet.has(name)) continue;
    if (filter.excludeSet.has(name)) continue;

    selected.add(name);
  }

  return [...selected].sort(compareNames);
}

/**
 * Shapes sorted names into the final result.
 */
export function shapeResult(
  names: readonly string[],
  optInByName: ReadonlyMap<string, OptInStatus>,
  detailMap: DetailMap,
  detailsRequested: boolean
): RegionListResult {
  if (!detailsRequested) {
    return [...names];
  }

  return names.map((name): RegionRecord => {
    const optInStatus = statusOf(name, optInByName);
    const location = detailMap.get(name);
    return {
      name,
      optedIn: optInStatus === 'opted-in',
      optInStatus,
      ...(location !== undefined ? { location } : {}),
    };
  });
}

/**
 * Runs selection and shaping in one pass.
 */
export function assemble(input: AssembleInput): RegionListResult {
  const names = selectRegionNames(input);
  return shapeResult(names, input.optInByName, input.detailMap, input.detailsRequested);
}
