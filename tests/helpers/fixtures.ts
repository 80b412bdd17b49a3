/**
 * Test fixtures and mock data factories.
 *
 * Provides reusable test data for unit tests.
 */

import type { Context } from 'aws-lambda';
import { EC2Client, type Region } from '@aws-sdk/client-ec2';
import { SSMClient } from '@aws-sdk/client-ssm';
import type { RegionClients } from '@core/clients';
import { DEFAULT_LOCATION_PARAMETER_TEMPLATE } from '@core/config';
import type { RegionListSettings } from '@shared/types';

/**
 * DescribeRegions entries covering every opt-in status, deliberately unsorted.
 */
export const sampleRegions: Region[] = [
  { RegionName: 'us-west-1', OptInStatus: 'opt-in-not-required' },
  { RegionName: 'eu-west-1', OptInStatus: 'opted-in' },
  { RegionName: 'af-south-1', OptInStatus: 'not-opted-in' },
  { RegionName: 'us-east-1', OptInStatus: 'opt-in-not-required' },
  { RegionName: 'ap-east-1', OptInStatus: 'opted-in' },
];

/**
 * Locations keyed by SSM parameter name.
 */
export const sampleLocations: Record<string, string> = {
  '/aws/service/global-infrastructure/regions/us-east-1/longName': 'US East (N. Virginia)',
  '/aws/service/global-infrastructure/regions/us-west-1/longName': 'US West (N. California)',
  '/aws/service/global-infrastructure/regions/eu-west-1/longName': 'Europe (Ireland)',
  '/aws/service/global-infrastructure/regions/ap-east-1/longName': 'Asia Pacific (Hong Kong)',
};

export const testSettings: RegionListSettings = {
  clientRegion: 'us-east-1',
  locationParameterTemplate: DEFAULT_LOCATION_PARAMETER_TEMPLATE,
};

/**
 * Creates clients for use with aws-sdk-client-mock.
 */
export function createTestClients(): RegionClients {
  return {
    ec2: new EC2Client({ region: 'us-east-1' }),
    ssm: new SSMClient({ region: 'us-east-1' }),
  };
}

/**
 * Creates a mock AWS Lambda Context.
 *
 * @param overrides - Optional overrides for specific context properties
 */
export function createMockContext(overrides: Partial<Context> = {}): Context {
  const defaultContext: Context = {
    callbackWaitsForEmptyEventLoop: true,
    functionName: 'region-list-test',
    functionVersion: '1',
    invokedFunctionArn: 'arn:aws:lambda:us-east-1:123456789012:function:region-list-test',
    memoryLimitInMB: '256',
    awsRequestId: 'test-request-id-123',
    logGroupName: '/aws/lambda/region-list-test',
    logStreamName: '2024/12/22/[$LATEST]abc123',
    getRemainingTimeInMillis: () => 30000,
    done: () => {},
    fail: () => {},
    succeed: () => {},
  };

  return { ...defaultContext, ...overrides };
}
