/**
 * Region enumeration via EC2 DescribeRegions.
 *
 * Lists every region (including those the account has not opted into) so
 * that opt-in status is visible to later stages.
 */

import { DescribeRegionsCommand, type EC2Client, type Region } from '@aws-sdk/client-ec2';
import type { EnumeratedRegion, OptInStatus } from '@shared/types';
import { OPT_IN_STATUSES } from '@shared/types';
import { RegionListingError, errorMessage } from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('region-list:enumerator');

function isOptInStatus(value: string | undefined): value is OptInStatus {
  return value !== undefined && OPT_IN_STATUSES.has(value);
}

/**
 * Converts one DescribeRegions entry, rejecting malformed data.
 */
function toEnumeratedRegion(region: Region): EnumeratedRegion {
  const name = region.RegionName;
  if (!name) {
    throw new RegionListingError('DescribeRegions returned a region without a RegionName');
  }

  const status = region.OptInStatus;
  if (!isOptInStatus(status)) {
    throw new RegionListingError(
      `DescribeRegions returned unknown opt-in status '${String(status)}' for region ${name}`
    );
  }

  return { name, optInStatus: status, optedIn: status === 'opted-in' };
}

/**
 * Lists all regions visible to the account with their opt-in status.
 *
 * @param client - EC2 client to call
 * @returns Regions in the order the API returned them
 *
 * @throws {RegionListingError} If the call fails or returns malformed data
 */
export async function enumerateRegions(client: EC2Client): Promise<EnumeratedRegion[]> {
  let regions: Region[];
  try {
    const response = await client.send(new DescribeRegionsCommand({ AllRegions: true }));
    regions = response.Regions ?? [];
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'DescribeRegions failed');
    throw new RegionListingError(
      `An error occurred while listing regions: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  const enumerated = regions.map(toEnumeratedRegion);
  logger.debug(`Enumerated ${enumerated.length} regions`);
  return enumerated;
}

/**
 * Keeps the regions the account can use: opted in, or enabled by default.
 */
export function usableRegions(regions: readonly EnumeratedRegion[]): EnumeratedRegion[] {
  return regions.filter((region) => region.optInStatus !== 'not-opted-in');
}
