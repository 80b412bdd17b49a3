/**
 * Shared type definitions for the region list pipeline.
 *
 * Centralizes shared types to avoid circular dependencies between stages.
 */

/**
 * Account-level enablement of a region as reported by EC2 DescribeRegions.
 */
export type OptInStatus = 'opted-in' | 'not-opted-in' | 'opt-in-not-required';

export const OPT_IN_STATUSES: ReadonlySet<string> = new Set<OptInStatus>([
  'opted-in',
  'not-opted-in',
  'opt-in-not-required',
]);

/**
 * A region as returned by the enumerator stage.
 */
export interface EnumeratedRegion {
  name: string;
  optInStatus: OptInStatus;
  /** True only when the account has explicitly opted in */
  optedIn: boolean;
}

/**
 * A region in a detailed result.
 *
 * `location` is present only when the SSM lookup for that region succeeded.
 */
export interface RegionRecord {
  name: string;
  optedIn: boolean;
  optInStatus: OptInStatus;
  location?: string;
}

/**
 * Include/exclude filter. An empty set places no restriction on its axis.
 */
export interface FilterSpec {
  includeSet: ReadonlySet<string>;
  excludeSet: ReadonlySet<string>;
}

/**
 * Outcome of a single region's location lookup.
 */
export type DetailOutcome =
  | { status: 'found'; name: string; location: string }
  | { status: 'absent'; name: string; reason: string };

/**
 * Region name -> location, `undefined` when the lookup did not succeed.
 */
export type DetailMap = ReadonlyMap<string, string | undefined>;

/**
 * Result shape: plain names, or records when details were requested.
 */
export type RegionListResult = string[] | RegionRecord[];

/**
 * Runtime settings read from the environment.
 */
export interface RegionListSettings {
  /** Region the EC2 and SSM clients call; SDK resolution when undefined */
  clientRegion?: string;
  /** SSM parameter name template containing a `{region}` placeholder */
  locationParameterTemplate: string;
}
