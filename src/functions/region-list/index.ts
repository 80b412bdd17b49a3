/**
 * AWS Lambda handler for the region list.
 *
 * Validates the event, runs the region list pipeline, and returns the result
 * as a JSON response.
 */

import type { Context } from 'aws-lambda';
import type { RegionListResult } from '@shared/types';
import { errorMessage } from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';
import { getRegionList } from '@core/regionList';
import { describeIssues, RegionListOptionsSchema } from '@core/config';

const logger = setupLogger('region-list:main');

// Profile and region come from the function's environment, not the event
const RegionListEventSchema = RegionListOptionsSchema.pick({
  includeList: true,
  excludeList: true,
  allRegions: true,
  details: true,
}).strict();

/**
 * Lambda response structure.
 */
export interface LambdaResponse {
  statusCode: number;
  body: string;
}

/**
 * Successful response body.
 */
export interface RegionListResponseBody {
  regions: RegionListResult;
  count: number;
  details: boolean;
  timestamp: string;
  request_id: string;
}

function errorResponse(statusCode: number, error: string, requestId: string): LambdaResponse {
  return {
    statusCode,
    body: JSON.stringify({
      error,
      timestamp: new Date().toISOString(),
      request_id: requestId,
    }),
  };
}

/**
 * Lambda handler function.
 *
 * @param event - Filters and output shape
 * @param context - Lambda context object
 * @returns Lambda response with statusCode and JSON body
 *
 * @example
 * Event:
 * {
 *   "excludeList": ["us-west-1"],
 *   "details": true
 * }
 *
 * Response:
 * {
 *   "statusCode": 200,
 *   "body": "{\"regions\":[{\"name\":\"eu-west-1\",...}],\"count\":2,...}"
 * }
 */
export async function main(event: unknown, context: Context): Promise<LambdaResponse> {
  const requestId = context.awsRequestId || 'local-test';
  const functionName = context.functionName || 'region-list';

  logger.info({ requestId, functionName }, 'Lambda invoked');

  const parsed = RegionListEventSchema.safeParse(event ?? {});
  if (!parsed.success) {
    const message = describeIssues(parsed.error);
    logger.warn({ requestId, issues: message }, 'Invalid event');
    return errorResponse(400, `Invalid event: ${message}`, requestId);
  }

  const { includeList, excludeList, allRegions, details } = parsed.data;

  try {
    const regions = await getRegionList({ includeList, excludeList, allRegions, details });

    const body: RegionListResponseBody = {
      regions,
      count: regions.length,
      details,
      timestamp: new Date().toISOString(),
      request_id: requestId,
    };

    logger.info({ count: body.count, details, requestId }, 'Lambda execution completed successfully');

    return {
      statusCode: 200,
      body: JSON.stringify(body),
    };
  } catch (error) {
    logger.error(
      {
        error: errorMessage(error),
        errorName: error instanceof Error ? error.name : undefined,
        requestId,
      },
      'Lambda execution failed'
    );

    return errorResponse(500, errorMessage(error), requestId);
  }
}
