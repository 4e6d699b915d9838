/**
 * External collaborators handed to tools through the ToolContext.
 *
 * Built once by the orchestrator at startup. Vendor clients need the region
 * and API credentials the wizard collects, so they come from a factory.
 * Tests substitute in-process fakes.
 */

import type { Logger } from 'pino';
import type { CloudRegion } from '@/config/regions';
import type { CommandRunner } from '@/lib/command-runner';
import type { DockerClient } from '@/infra/docker/client';
import type { DockerAuthConfig } from '@/infra/docker/credential-helpers';
import type { HelmClient } from '@/infra/helm/client';
import type { ProbeFn } from '@/infra/network/connectivity';
import type { AuthClient } from '@/infra/vendor/auth-client';
import type { VendorApiClient } from '@/infra/vendor/api-client';
import type { Result } from '@/types/core';

export type LocalCredentialLookup = (
  registry: string,
  logger: Logger,
) => Promise<Result<DockerAuthConfig | null>>;

export interface VendorCredentials {
  region: CloudRegion;
  clientId: string;
  clientSecret: string;
}

export interface VendorClients {
  auth: AuthClient;
  vendorApi: VendorApiClient;
}

/**
 * Returns the same clients (and so the same token cache) for the same
 * credentials.
 */
export type VendorClientFactory = (credentials: VendorCredentials) => VendorClients;

export interface Services {
  runner: CommandRunner;
  docker: DockerClient;
  helm: HelmClient;
  vendor: VendorClientFactory;
  /** Credentials for the operator's local registry */
  localCredentials: LocalCredentialLookup;
  /** Connectivity probe; the TCP probe when absent */
  probe?: ProbeFn;
}
