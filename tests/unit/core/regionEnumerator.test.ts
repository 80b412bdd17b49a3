/**
 * Unit tests for core/regionEnumerator.ts
 *
 * Uses aws-sdk-client-mock to mock EC2 DescribeRegions.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import { EC2Client, DescribeRegionsCommand } from '@aws-sdk/client-ec2';
import { enumerateRegions, usableRegions } from '@core/regionEnumerator';
import { RegionListingError } from '@shared/errors';
import { sampleRegions } from '../../helpers/fixtures';

const ec2Mock = mockClient(EC2Client);

describe('Region Enumerator', () => {
  let client: EC2Client;

  beforeEach(() => {
    ec2Mock.reset();
    client = new EC2Client({ region: 'us-east-1' });
  });

  describe('enumerateRegions', () => {
    it('should request all regions including those not opted in', async () => {
      ec2Mock.on(DescribeRegionsCommand).resolves({ Regions: sampleRegions });

      await enumerateRegions(client);

      const calls = ec2Mock.commandCalls(DescribeRegionsCommand);
      expect(calls).toHaveLength(1);
      expect(calls[0].args[0].input).toEqual({ AllRegions: true });
    });

    it('should return every region with its opt-in status in API order', async () => {
      ec2Mock.on(DescribeRegionsCommand).resolves({ Regions: sampleRegions });

      const regions = await enumerateRegions(client);

      expect(regions).toEqual([
        { name: 'us-west-1', optInStatus: 'opt-in-not-required', optedIn: false },
        { name: 'eu-west-1', optInStatus: 'opted-in', optedIn: true },
        { name: 'af-south-1', optInStatus: 'not-opted-in', optedIn: false },
        { name: 'us-east-1', optInStatus: 'opt-in-not-required', optedIn: false },
        { name: 'ap-east-1', optInStatus: 'opted-in', optedIn: true },
      ]);
    });

    it('should return an empty list when the response has no regions', async () => {
      ec2Mock.on(DescribeRegionsCommand).resolves({});

      await expect(enumerateRegions(client)).resolves.toEqual([]);
    });

    it('should wrap API failures in RegionListingError with the cause', async () => {
      const denied = new Error('User is not authorized to perform: ec2:DescribeRegions');
      denied.name = 'UnauthorizedOperation';
      ec2Mock.on(DescribeRegionsCommand).rejects(denied);

      const error = await enumerateRegions(client).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RegionListingError);
      expect(error instanceof Error && error.message).toBe(
        'An error occurred while listing regions: User is not authorized to perform: ec2:DescribeRegions'
      );
      expect(error instanceof Error && error.cause).toBe(denied);
    });

    it('should reject an unknown opt-in status', async () => {
      ec2Mock.on(DescribeRegionsCommand).resolves({
        Regions: [{ RegionName: 'us-east-1', OptInStatus: 'pending' }],
      });

      await expect(enumerateRegions(client)).rejects.toThrow(
        "DescribeRegions returned unknown opt-in status 'pending' for region us-east-1"
      );
    });

    it('should reject a region without a name', async () => {
      ec2Mock.on(DescribeRegionsCommand).resolves({
        Regions: [{ OptInStatus: 'opted-in' }],
      });

      await expect(enumerateRegions(client)).rejects.toThrow(RegionListingError);
    });
  });

  describe('usableRegions', () => {
    it('should keep opted-in and default-enabled regions only', () => {
      const usable = usableRegions([
        { name: 'a', optInStatus: 'opted-in', optedIn: true },
        { name: 'b', optInStatus: 'opt-in-not-required', optedIn: false },
        { name: 'c', optInStatus: 'not-opted-in', optedIn: false },
      ]);

      expect(usable.map((region) => region.name)).toEqual(['a', 'b']);
    });
  });
});
