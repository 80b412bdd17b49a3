/**
 * AWS SDK client construction for the region list pipeline.
 */

import { EC2Client } from '@aws-sdk/client-ec2';
import { SSMClient } from '@aws-sdk/client-ssm';

export interface RegionClients {
  ec2: EC2Client;
  ssm: SSMClient;
}

export interface RegionClientOptions {
  /** Shared-config profile supplying credentials and region */
  profile?: string;
  /** Region the clients call; overrides the profile's region */
  region?: string;
}

/**
 * Creates the EC2 and SSM clients used by one getRegionList call.
 *
 * A profile is handed to the SDK as client config, so both its credentials
 * and its region apply to enumeration and detail lookups alike.
 */
export function createRegionClients(options: RegionClientOptions = {}): RegionClients {
  const { profile, region } = options;
  const clientConfig = {
    ...(region ? { region } : {}),
    ...(profile ? { profile } : {}),
  };

  return {
    ec2: new EC2Client(clientConfig),
    ssm: new SSMClient(clientConfig),
  };
}
