import { describe, it, expect } from '@jest/globals';
import { CLOUD_REGIONS, CLOUD_REGION_IDS, resolveRegion } from '@/config/regions';
import { ERROR_CODES } from '@/types';

describe('cloud regions', () => {
  it('should derive the token endpoint from the API host', () => {
    for (const id of CLOUD_REGION_IDS) {
      const region = CLOUD_REGIONS[id];
      expect(region.tokenEndpoint).toBe(`https://${region.apiHost}/oauth2/token`);
      expect(region.requiredDomains).toContain(region.apiHost);
    }
  });

  it('should use the short cloud tag for government regions', () => {
    expect(CLOUD_REGIONS['us-gov-1'].cloudTag).toBe('gov1');
    expect(CLOUD_REGIONS['us-gov-2'].cloudTag).toBe('gov2');
    expect(CLOUD_REGIONS['eu-1'].cloudTag).toBe('eu-1');
  });

  describe('resolveRegion', () => {
    it('should resolve ids case-insensitively', () => {
      const result = resolveRegion(' EU-1 ');

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.apiHost).toBe('api.eu-1.crowdstrike.com');
        expect(result.value.requiredDomains).toEqual([
          'ts01-lanner-lion.cloudsink.net',
          'falcon.eu-1.crowdstrike.com',
          'api.eu-1.crowdstrike.com',
        ]);
      }
    });

    it('should reject unknown regions without falling back', () => {
      const result = resolveRegion('eu-2');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe('Unknown cloud region: "eu-2"');
        expect(result.guidance?.code).toBe(ERROR_CODES.userInput);
        expect(result.guidance?.hint).toBe('Supported regions: us-1, us-2, eu-1, us-gov-1, us-gov-2');
      }
    });
  });
});
