/**
 * Settings and option validation for the region list pipeline.
 *
 * Settings come from environment variables; per-call options come from the
 * caller. Both are validated with Zod before any AWS call is made.
 */

import { z } from 'zod';
import type { RegionListSettings } from '@shared/types';
import { InvalidRegionOptionsError, RegionListingConfigError } from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('region-list:config');

export const REGION_PLACEHOLDER = '{region}';

export const DEFAULT_LOCATION_PARAMETER_TEMPLATE =
  '/aws/service/global-infrastructure/regions/{region}/longName';

const SettingsSchema = z.object({
  REGION_LIST_CLIENT_REGION: z.string().min(1).optional(),
  REGION_LIST_LOCATION_PARAMETER: z
    .string()
    .refine((value) => value.includes(REGION_PLACEHOLDER), {
      message: `must contain the ${REGION_PLACEHOLDER} placeholder`,
    })
    .default(DEFAULT_LOCATION_PARAMETER_TEMPLATE),
});

/**
 * Options accepted by getRegionList.
 */
export const RegionListOptionsSchema = z
  .object({
    includeList: z.array(z.string().min(1)).optional(),
    excludeList: z.array(z.string().min(1)).optional(),
    allRegions: z.boolean().default(true),
    details: z.boolean().default(false),
    profile: z.string().min(1).optional(),
    region: z.string().min(1).optional(),
  })
  .strict();

export type RegionListOptionsInput = z.input<typeof RegionListOptionsSchema>;
export type RegionListOptions = z.output<typeof RegionListOptionsSchema>;

/**
 * Renders Zod issues as `path: message` pairs.
 */
export function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Reads runtime settings from the environment.
 *
 * Empty strings are treated as unset.
 *
 * @throws {RegionListingConfigError} If a variable has an invalid value
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): RegionListSettings {
  const raw = {
    REGION_LIST_CLIENT_REGION: env.REGION_LIST_CLIENT_REGION || undefined,
    REGION_LIST_LOCATION_PARAMETER: env.REGION_LIST_LOCATION_PARAMETER || undefined,
  };

  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RegionListingConfigError(`Invalid settings: ${describeIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }

  const settings: RegionListSettings = {
    clientRegion: parsed.data.REGION_LIST_CLIENT_REGION,
    locationParameterTemplate: parsed.data.REGION_LIST_LOCATION_PARAMETER,
  };

  logger.debug(settings, 'Settings loaded');
  return settings;
}

/**
 * Validates getRegionList options and applies defaults.
 *
 * @throws {InvalidRegionOptionsError} If an option has the wrong type or is unknown
 */
export function parseRegionListOptions(input: unknown = {}): RegionListOptions {
  const parsed = RegionListOptionsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new InvalidRegionOptionsError(
      `Invalid region list options: ${describeIssues(parsed.error)}`,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}
