/**
 * Production wiring of the collaborators tools receive through ToolContext.
 */

import type { Logger } from 'pino';
import type { Services, VendorClients, VendorCredentials } from '@/core/services';
import { createCommandRunner } from '@/lib/command-runner';
import { createDockerClient } from '@/infra/docker/client';
import { getRegistryCredentials } from '@/infra/docker/credential-helpers';
import { createHelmClient } from '@/infra/helm/client';
import { createAuthClient } from '@/infra/vendor/auth-client';
import { createVendorApiClient } from '@/infra/vendor/api-client';

export interface ServiceOptions {
  logger: Logger;
  /** Docker daemon socket; dockerode's default when absent */
  dockerSocket?: string;
}

function credentialsKey({ region, clientId, clientSecret }: VendorCredentials): string {
  return JSON.stringify([region.id, clientId, clientSecret]);
}

/**
 * Build real services. `overrides` replaces individual collaborators.
 */
export function createServices(options: ServiceOptions, overrides: Partial<Services> = {}): Services {
  const { logger } = options;
  const runner = overrides.runner ?? createCommandRunner();
  const vendorClients = new Map<string, VendorClients>();

  return {
    runner,
    docker:
      overrides.docker ??
      createDockerClient(logger, {
        ...(options.dockerSocket !== undefined && { socketPath: options.dockerSocket }),
      }),
    helm: overrides.helm ?? createHelmClient({ runner, logger }),
    localCredentials:
      overrides.localCredentials ??
      ((registry, lookupLogger) => getRegistryCredentials(registry, lookupLogger)),
    vendor:
      overrides.vendor ??
      ((credentials) => {
        const key = credentialsKey(credentials);
        const existing = vendorClients.get(key);
        if (existing) return existing;

        const clients: VendorClients = {
          auth: createAuthClient({ ...credentials, logger }),
          vendorApi: createVendorApiClient({ region: credentials.region, logger }),
        };
        vendorClients.set(key, clients);
        return clients;
      }),
    ...(overrides.probe !== undefined && { probe: overrides.probe }),
  };
}
