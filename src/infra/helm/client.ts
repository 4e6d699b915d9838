/**
 * Read-only Helm queries against the target cluster
 *
 * These are the only cluster calls the tool makes. A failed query is
 * reported as `Unknown`, never as an absent release.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS, HELM } from '@/config/constants';
import { formatCommand, type CommandRunner } from '@/lib/command-runner';
import type { ClusterState } from '@/types';

const valuesLevelSchema = z.record(z.unknown());

/**
 * String found at `path` in parsed Helm values, if any.
 */
function stringAt(values: unknown, path: readonly string[]): string | undefined {
  let current = values;
  for (const key of path) {
    const level = valuesLevelSchema.safeParse(current);
    if (!level.success) return undefined;
    current = level.data[key];
  }
  return typeof current === 'string' ? current : undefined;
}

export interface HelmClient {
  detectClusterState(release: string, namespace: string): Promise<ClusterState>;

  /**
   * Image tag recorded at `tagPath` in the installed release's values, if
   * readable.
   */
  getInstalledImageTag(release: string, namespace: string, tagPath: readonly string[]): Promise<string | undefined>;
}

export interface HelmClientOptions {
  runner: CommandRunner;
  logger: Logger;
  timeoutMs?: number;
}

export function createHelmClient({ runner, logger, timeoutMs }: HelmClientOptions): HelmClient {
  const timeout = timeoutMs ?? DEFAULT_TIMEOUTS.clusterQuery;

  return {
    async detectClusterState(release, namespace) {
      const argv = ['helm', 'status', release, '-n', namespace];
      const query = formatCommand(argv);
      const outcome = await runner.run('helm', argv.slice(1), { timeout });

      if (outcome.exitCode === 0) {
        logger.debug({ release, namespace }, 'Release is installed');
        return { kind: 'Present' };
      }

      if (!outcome.notFound && !outcome.timedOut && outcome.stderr.includes(HELM.RELEASE_NOT_FOUND)) {
        logger.debug({ release, namespace }, 'Release is not installed');
        return { kind: 'NotPresent' };
      }

      let reason: string;
      if (outcome.notFound) {
        reason = 'helm is not on PATH';
      } else if (outcome.timedOut) {
        reason = `timed out after ${timeout}ms`;
      } else {
        reason = outcome.stderr.trim() || `exit code ${String(outcome.exitCode)}`;
      }
      logger.warn({ query, reason }, 'Release state could not be determined');
      return { kind: 'Unknown', query, reason };
    },

    async getInstalledImageTag(release, namespace, tagPath) {
      const outcome = await runner.run(
        'helm',
        ['get', 'values', release, '-n', namespace, '-o', 'json'],
        { timeout },
      );
      if (outcome.exitCode !== 0) {
        logger.debug({ release, namespace, stderr: outcome.stderr }, 'Could not read release values');
        return undefined;
      }

      let data: unknown;
      try {
        data = JSON.parse(outcome.stdout);
      } catch (error) {
        logger.debug({ error }, 'Release values are not JSON');
        return undefined;
      }

      return stringAt(data, tagPath);
    },
  };
}
