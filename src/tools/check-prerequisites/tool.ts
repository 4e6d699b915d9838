/**
 * Check Prerequisites Tool
 *
 * Confirms the external tools the plan depends on are installed and recent
 * enough, that the Docker daemon answers when an image will be mirrored, and
 * that kubectl can reach the cluster before any cluster query is made.
 */

import { setupToolContext } from '@/lib/tool-helpers';
import { REQUIRED_BINARIES, checkBinary, checkClusterAccess, type BinaryStatus } from '@/infra/health/checks';
import { Success, Failure, ERROR_CODES, type Result } from '@/types';
import type { ToolContext } from '@/core/context';
import { tool } from '@/types/tool';
import { checkPrerequisitesSchema, type CheckPrerequisitesParams } from './schema';

export interface CheckPrerequisitesResult {
  /**
   * Natural language summary for user display.
   * @example "✅ Prerequisites satisfied: docker 24.0.7, helm 3.14.0, kubectl 1.29.1."
   */
  summary: string;
  binaries: BinaryStatus[];
  warnings: string[];
  clusterReachable: boolean;
}

/** Docker is only needed when an image will be mirrored. */
function requiredFor(action: CheckPrerequisitesParams['action']) {
  return action === 'uninstall'
    ? REQUIRED_BINARIES.filter((requirement) => requirement.name !== 'docker')
    : REQUIRED_BINARIES;
}

async function handleCheckPrerequisites(
  input: CheckPrerequisitesParams,
  ctx: ToolContext,
): Promise<Result<CheckPrerequisitesResult>> {
  const { logger, timer } = setupToolContext(ctx, 'check-prerequisites');
  const { runner, docker } = ctx.services;
  const mirrors = input.action !== 'uninstall';

  const binaries: BinaryStatus[] = [];
  const warnings: string[] = [];

  for (const requirement of requiredFor(input.action)) {
    const status = await checkBinary(runner, requirement, logger);
    if (!status.ok) {
      timer.error(status.error);
      return status;
    }
    binaries.push(status.value);
    if (status.value.warning) {
      warnings.push(`${status.value.warning}, continuing`);
    }
  }

  if (mirrors) {
    const ping = await docker.ping();
    if (!ping.ok) {
      timer.error(ping.error);
      return Failure(ping.error, {
        message: 'Docker is required for image operations',
        ...(ping.guidance?.hint !== undefined && { hint: ping.guidance.hint }),
        resolution: 'Start the Docker daemon and make sure the current user can reach it',
        command: 'docker info',
        code: ERROR_CODES.dependencyMissing,
      });
    }
  }

  let clusterReachable = false;
  if (mirrors && input.checkCluster) {
    const access = await checkClusterAccess(runner, logger);
    if (!access.ok) {
      timer.error(access.error);
      return access;
    }
    clusterReachable = true;
  }

  const found = binaries.map((binary) => (binary.version ? `${binary.name} ${binary.version}` : binary.name));
  timer.end({ binaries: found, warnings: warnings.length });

  return Success({
    summary: `✅ Prerequisites satisfied: ${found.join(', ')}.`,
    binaries,
    warnings,
    clusterReachable,
  });
}

export default tool({
  name: 'check-prerequisites',
  description: 'Verify docker, helm and kubectl are installed and the cluster is reachable',
  schema: checkPrerequisitesSchema,
  handler: handleCheckPrerequisites,
  chainHints: {
    success: 'Prerequisites satisfied. Continue with the connectivity preflight.',
    failure: 'Install or upgrade the missing tool, then rerun.',
  },
});
