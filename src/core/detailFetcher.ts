/**
 * Region location lookups via SSM Parameter Store.
 *
 * AWS publishes each region's long name under the public
 * global-infrastructure parameter tree. Lookups run in parallel, one per
 * region, and are best-effort: a failed lookup leaves that region without a
 * location and never affects the others.
 */

import { GetParameterCommand, type SSMClient } from '@aws-sdk/client-ssm';
import type { DetailMap, DetailOutcome } from '@shared/types';
import { errorMessage } from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';
import { DEFAULT_LOCATION_PARAMETER_TEMPLATE, REGION_PLACEHOLDER } from './config';

const logger = setupLogger('region-list:detail-fetcher');

export interface DetailFetchOptions {
  /** SSM parameter name template containing `{region}` */
  parameterTemplate?: string;
}

/**
 * Builds the SSM parameter name holding a region's location.
 *
 * @example
 * locationParameterName('eu-west-1')
 * // => '/aws/service/global-infrastructure/regions/eu-west-1/longName'
 */
export function locationParameterName(
  regionName: string,
  template: string = DEFAULT_LOCATION_PARAMETER_TEMPLATE
): string {
  return template.split(REGION_PLACEHOLDER).join(regionName);
}

/**
 * Looks up a single region's location. Never rejects.
 */
export async function fetchRegionDetail(
  regionName: string,
  client: SSMClient,
  options: DetailFetchOptions = {}
): Promise<DetailOutcome> {
  const parameterName = locationParameterName(regionName, options.parameterTemplate);

  try {
    const response = await client.send(new GetParameterCommand({ Name: parameterName }));
    const location = response.Parameter?.Value;

    if (!location) {
      return { status: 'absent', name: regionName, reason: `Parameter ${parameterName} has no value` };
    }

    return { status: 'found', name: regionName, location };
  } catch (error) {
    return { status: 'absent', name: regionName, reason: errorMessage(error) };
  }
}

/**
 * Fetches locations for the given regions in parallel.
 *
 * @param regionNames - Regions to look up; duplicates are fetched once
 * @param client - SSM client to call
 * @returns Map from every requested name to its location, or undefined when
 *   the lookup did not succeed
 */
export async function fetchRegionDetails(
  regionNames: Iterable<string>,
  client: SSMClient,
  options: DetailFetchOptions = {}
): Promise<DetailMap> {
  const names = [...new Set(regionNames)];
  const details = new Map<string, string | undefined>();

  if (names.length === 0) {
    return details;
  }

  logger.debug(`Fetching locations for ${names.length} region(s)`);

  const outcomes = await Promise.all(
    names.map((name) => fetchRegionDetail(name, client, options))
  );

  for (const outcome of outcomes) {
    if (outcome.status === 'found') {
      details.set(outcome.name, outcome.location);
    } else {
      logger.warn({ region: outcome.name, reason: outcome.reason }, 'Location lookup failed');
      details.set(outcome.name, undefined);
    }
  }

  const found = outcomes.filter((outcome) => outcome.status === 'found').length;
  logger.debug(`Resolved ${found}/${names.length} region locations`);
  return details;
}
