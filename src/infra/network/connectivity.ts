/**
 * Connectivity preflight
 *
 * TCP probes to every domain a region requires. Probes run in a bounded pool
 * under one overall deadline; a probe still pending at the deadline counts as
 * failed.
 */

import { Socket } from 'node:net';
import pLimit from 'p-limit';
import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS, NETWORK } from '@/config/constants';
import { extractErrorMessage } from '@/lib/errors';
import type { CloudRegion } from '@/config/regions';

export interface ProbeResult {
  domain: string;
  reachable: boolean;
  /** Failure reason, or 'OK' */
  detail: string;
}

export type ProbeFn = (domain: string, port: number, timeoutMs: number) => Promise<ProbeResult>;

export interface ConnectivityOptions {
  logger: Logger;
  probe?: ProbeFn;
  port?: number;
  probeTimeoutMs?: number;
  overallTimeoutMs?: number;
  concurrency?: number;
}

export interface ConnectivityReport {
  region: CloudRegion['id'];
  results: ProbeResult[];
  /** Failed probes, in the order the region declares its domains */
  failures: ProbeResult[];
}

/**
 * Open a TCP connection and close it immediately.
 */
export const tcpProbe: ProbeFn = (domain, port, timeoutMs) =>
  new Promise((resolve) => {
    const socket = new Socket();
    const finish = (reachable: boolean, detail: string): void => {
      socket.destroy();
      resolve({ domain, reachable, detail });
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true, 'OK'));
    socket.once('timeout', () => finish(false, `timed out after ${timeoutMs}ms`));
    socket.once('error', (error) => finish(false, extractErrorMessage(error)));
    socket.connect(port, domain);
  });

/**
 * Probe every required domain of `region` and aggregate the outcome.
 */
export async function checkConnectivity(
  region: CloudRegion,
  options: ConnectivityOptions,
): Promise<ConnectivityReport> {
  const probe = options.probe ?? tcpProbe;
  const port = options.port ?? NETWORK.PORT;
  const probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_TIMEOUTS.connectivityProbe;
  const overallTimeoutMs = options.overallTimeoutMs ?? DEFAULT_TIMEOUTS.connectivityOverall;
  const concurrency = options.concurrency ?? NETWORK.CONCURRENCY;
  const domains = region.requiredDomains;

  const settled = new Map<string, ProbeResult>();
  const limit = pLimit(Math.max(concurrency, 1));
  const runProbe = async (domain: string): Promise<void> => {
    let result: ProbeResult;
    try {
      result = await probe(domain, port, probeTimeoutMs);
    } catch (error) {
      result = { domain, reachable: false, detail: extractErrorMessage(error) };
    }
    settled.set(domain, result);
    options.logger.debug({ ...result }, 'Connectivity probe finished');
  };

  let markExpired: () => void = () => undefined;
  const expired = new Promise<'expired'>((resolve) => {
    markExpired = () => resolve('expired');
  });
  const deadline = setTimeout(() => {
    limit.clearQueue();
    markExpired();
  }, overallTimeoutMs);

  try {
    const pool = Promise.all(domains.map((domain) => limit(() => runProbe(domain))));
    const outcome = await Promise.race([pool.then(() => 'done' as const), expired]);
    if (outcome === 'expired') {
      options.logger.warn({ overallTimeoutMs }, 'Connectivity preflight deadline reached');
    }
  } finally {
    clearTimeout(deadline);
  }

  const results = domains.map(
    (domain) =>
      settled.get(domain) ?? {
        domain,
        reachable: false,
        detail: `no answer within ${overallTimeoutMs}ms`,
      },
  );

  return {
    region: region.id,
    results,
    failures: results.filter((result) => !result.reachable),
  };
}
