/**
 * Vendor cloud regions
 *
 * Each region pins the API host used for token exchange, the vendor image
 * registry, the path segment the registry uses for the region, and the
 * domains a sensor must reach.
 */

import { z } from 'zod';
import { Success, Failure, ERROR_CODES, type Result } from '@/types/core';

export const CLOUD_REGION_IDS = ['us-1', 'us-2', 'eu-1', 'us-gov-1', 'us-gov-2'] as const;

export const cloudRegionIdSchema = z.enum(CLOUD_REGION_IDS).describe('Vendor cloud region');

export type CloudRegionId = z.infer<typeof cloudRegionIdSchema>;

export interface CloudRegion {
  id: CloudRegionId;
  apiHost: string;
  tokenEndpoint: string;
  registryHost: string;
  /** Region segment in vendor image paths */
  cloudTag: string;
  requiredDomains: readonly string[];
}

function region(
  id: CloudRegionId,
  apiHost: string,
  cloudTag: string,
  registryHost: string,
  requiredDomains: readonly string[],
): CloudRegion {
  return {
    id,
    apiHost,
    tokenEndpoint: `https://${apiHost}/oauth2/token`,
    registryHost,
    cloudTag,
    requiredDomains,
  };
}

export const CLOUD_REGIONS: Readonly<Record<CloudRegionId, CloudRegion>> = {
  'us-1': region('us-1', 'api.crowdstrike.com', 'us-1', 'registry.crowdstrike.com', [
    'ts01-b.cloudsink.net',
    'falcon.crowdstrike.com',
    'api.crowdstrike.com',
  ]),
  'us-2': region('us-2', 'api.us-2.crowdstrike.com', 'us-2', 'registry.crowdstrike.com', [
    'ts01-gyr-maverick.cloudsink.net',
    'falcon.us-2.crowdstrike.com',
    'api.us-2.crowdstrike.com',
  ]),
  'eu-1': region('eu-1', 'api.eu-1.crowdstrike.com', 'eu-1', 'registry.crowdstrike.com', [
    'ts01-lanner-lion.cloudsink.net',
    'falcon.eu-1.crowdstrike.com',
    'api.eu-1.crowdstrike.com',
  ]),
  'us-gov-1': region(
    'us-gov-1',
    'api.laggar.gcw.crowdstrike.com',
    'gov1',
    'registry.laggar.gcw.crowdstrike.com',
    [
      'ts01-laggar-gcw.cloudsink.net',
      'falcon.laggar.gcw.crowdstrike.com',
      'api.laggar.gcw.crowdstrike.com',
    ],
  ),
  'us-gov-2': region(
    'us-gov-2',
    'api.us-gov-2.crowdstrike.mil',
    'gov2',
    'registry.us-gov-2.crowdstrike.mil',
    [
      'ts01-us-gov-2.crowdstrike.mil',
      'falcon.us-gov-2.crowdstrike.mil',
      'api.us-gov-2.crowdstrike.mil',
    ],
  ),
};

/**
 * Look up a region by id. Unknown ids are a configuration error; there is no
 * fallback region.
 */
export function resolveRegion(id: string): Result<CloudRegion> {
  const parsed = cloudRegionIdSchema.safeParse(id.trim().toLowerCase());
  if (!parsed.success) {
    const message = `Unknown cloud region: "${id}"`;
    return Failure(message, {
      message,
      hint: `Supported regions: ${CLOUD_REGION_IDS.join(', ')}`,
      resolution: 'Pass one of the supported regions with --region or FALCON_CLOUD_REGION',
      code: ERROR_CODES.userInput,
    });
  }
  return Success(CLOUD_REGIONS[parsed.data]);
}
