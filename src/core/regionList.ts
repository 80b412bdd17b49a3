/**
 * Region list pipeline.
 *
 * Enumerates regions, narrows and sorts them, and optionally enriches each
 * with its location. Any failure surfaces as a single RegionListingError;
 * location lookups are best-effort and never fail the call.
 */

import type {
  OptInStatus,
  RegionListResult,
  RegionListSettings,
  RegionRecord,
} from '@shared/types';
import { RegionListingError, errorMessage } from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';
import { buildFilterSpec, selectRegionNames, shapeResult } from './assembler';
import { createRegionClients, type RegionClients } from './clients';
import { loadSettings, parseRegionListOptions, type RegionListOptionsInput } from './config';
import { fetchRegionDetails } from './detailFetcher';
import { enumerateRegions, usableRegions } from './regionEnumerator';

const logger = setupLogger('region-list:pipeline');

/**
 * Collaborators a caller may supply instead of the defaults.
 */
export interface RegionListDependencies {
  /** Pre-built clients; `profile` and `region` options are ignored when set */
  clients?: RegionClients;
  /** Settings; read from the environment when omitted */
  settings?: RegionListSettings;
}

/**
 * Retrieves the sorted list of regions available to the account.
 *
 * @param options - Filters and output shape, see RegionListOptionsSchema
 * @param dependencies - Optional clients and settings
 * @returns Region names, or RegionRecords when `details` is true
 *
 * @throws {RegionListingError} If regions cannot be listed or options are invalid
 *
 * @example
 * const names = await getRegionList({ excludeList: ['us-west-1'] });
 * const records = await getRegionList({ details: true, allRegions: false });
 */
export async function getRegionList(
  options: RegionListOptionsInput & { details: true },
  dependencies?: RegionListDependencies
): Promise<RegionRecord[]>;
export async function getRegionList(
  options?: RegionListOptionsInput & { details?: false },
  dependencies?: RegionListDependencies
): Promise<string[]>;
export async function getRegionList(
  options?: RegionListOptionsInput,
  dependencies?: RegionListDependencies
): Promise<RegionListResult>;
export async function getRegionList(
  options: RegionListOptionsInput = {},
  dependencies: RegionListDependencies = {}
): Promise<RegionListResult> {
  const parsed = parseRegionListOptions(options);
  const settings = dependencies.settings ?? loadSettings();
  const ownsClients = dependencies.clients === undefined;
  const clients =
    dependencies.clients ??
    createRegionClients({
      profile: parsed.profile,
      region: parsed.region ?? settings.clientRegion,
    });

  logger.debug(
    {
      allRegions: parsed.allRegions,
      details: parsed.details,
      include: parsed.includeList?.length ?? 0,
      exclude: parsed.excludeList?.length ?? 0,
    },
    'Retrieving region list'
  );

  try {
    const enumerated = await enumerateRegions(clients.ec2);
    const usable = usableRegions(enumerated);

    const optInByName = new Map<string, OptInStatus>(
      usable.map((region) => [region.name, region.optInStatus])
    );

    const names = selectRegionNames({
      usableNames: optInByName.keys(),
      optInByName,
      filter: buildFilterSpec(parsed.includeList, parsed.excludeList),
      allRegions: parsed.allRegions,
    });

    const detailMap = parsed.details
      ? await fetchRegionDetails(names, clients.ssm, {
          parameterTemplate: settings.locationParameterTemplate,
        })
      : new Map<string, string | undefined>();

    const result = shapeResult(names, optInByName, detailMap, parsed.details);

    logger.debug(
      { enumerated: enumerated.length, usable: usable.length, returned: result.length },
      'Region list retrieved'
    );
    return result;
  } catch (error) {
    if (error instanceof RegionListingError) {
      throw error;
    }
    throw new RegionListingError(`An unexpected error occurred: ${errorMessage(error)}`, {
      cause: error,
    });
  } finally {
    if (ownsClients) {
      clients.ec2.destroy();
      clients.ssm.destroy();
    }
  }
}
