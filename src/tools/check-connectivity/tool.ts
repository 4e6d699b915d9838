/**
 * Check Connectivity Tool
 *
 * Fails the run when any domain the region requires is unreachable. Runs
 * before credentials are requested.
 */

import { setupToolContext } from '@/lib/tool-helpers';
import { CLOUD_REGIONS } from '@/config/regions';
import { NETWORK } from '@/config/constants';
import { checkConnectivity, type ConnectivityReport } from '@/infra/network/connectivity';
import { Success, Failure, ERROR_CODES, type Result } from '@/types';
import type { ToolContext } from '@/core/context';
import { tool } from '@/types/tool';
import { checkConnectivitySchema, type CheckConnectivityParams } from './schema';

export interface CheckConnectivityResult extends ConnectivityReport {
  summary: string;
}

async function handleCheckConnectivity(
  input: CheckConnectivityParams,
  ctx: ToolContext,
): Promise<Result<CheckConnectivityResult>> {
  const { logger, timer } = setupToolContext(ctx, 'check-connectivity');
  const region = CLOUD_REGIONS[input.region];

  const report = await checkConnectivity(region, {
    logger,
    ...(ctx.services.probe && { probe: ctx.services.probe }),
    ...(input.probeTimeoutMs !== undefined && { probeTimeoutMs: input.probeTimeoutMs }),
    ...(input.overallTimeoutMs !== undefined && { overallTimeoutMs: input.overallTimeoutMs }),
    ...(input.concurrency !== undefined && { concurrency: input.concurrency }),
  });

  if (report.failures.length > 0) {
    const failing = report.failures.map((failure) => `${failure.domain} (${failure.detail})`);
    const error = `Required domains unreachable for ${region.id}: ${failing.join(', ')}`;
    timer.error(error);
    return Failure(error, {
      message: `Network connectivity check failed for ${region.id.toUpperCase()}`,
      hint: `${report.failures.length} of ${report.results.length} required domains did not accept a connection on port ${NETWORK.PORT}`,
      resolution: 'Allow outbound HTTPS to the listed domains through the firewall or proxy, then rerun',
      command: report.failures.map((failure) => `nc -vz ${failure.domain} ${NETWORK.PORT}`).join(' && '),
      code: ERROR_CODES.connectivity,
      details: { unreachable: report.failures.map((failure) => failure.domain) },
    });
  }

  timer.end({ region: region.id, domains: report.results.length });
  return Success({
    ...report,
    summary: `✅ Network connectivity OK for ${region.id.toUpperCase()} (${report.results.length} domains)`,
  });
}

export default tool({
  name: 'check-connectivity',
  description: 'Probe every domain the selected cloud region requires on port 443',
  schema: checkConnectivitySchema,
  handler: handleCheckConnectivity,
  chainHints: {
    success: 'All required domains are reachable. Continue with authentication.',
    failure: 'Open outbound access to the failing domains before retrying.',
  },
});
