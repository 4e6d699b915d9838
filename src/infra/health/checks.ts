/**
 * External tool checks
 *
 * docker, helm and kubectl must be on PATH, the latter two at a minimum
 * version. A version that cannot be parsed is reported, not fatal.
 */

import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS, HELM, KUBERNETES } from '@/config/constants';
import { formatCommand, type CommandRunner } from '@/lib/command-runner';
import { compareVersions } from '@/lib/validation';
import { Success, Failure, ERROR_CODES, type Result } from '@/types';

export interface BinaryRequirement {
  name: string;
  versionArgs: string[];
  minVersion?: string;
  installHint: string;
}

export interface BinaryStatus {
  name: string;
  version?: string;
  /** Set when the version could not be verified */
  warning?: string;
}

export const REQUIRED_BINARIES: readonly BinaryRequirement[] = [
  {
    name: 'docker',
    versionArgs: ['--version'],
    installHint: 'Install Docker Engine or Docker Desktop',
  },
  {
    name: 'helm',
    versionArgs: ['version', '--short'],
    minVersion: HELM.MIN_VERSION,
    installHint: 'Install Helm 3 from https://helm.sh/docs/intro/install/',
  },
  {
    name: 'kubectl',
    versionArgs: ['version', '--client'],
    minVersion: KUBERNETES.MIN_KUBECTL_VERSION,
    installHint: 'Install kubectl from https://kubernetes.io/docs/tasks/tools/',
  },
];

const VERSION_PATTERN = /(\d+\.\d+\.\d+)/;

export function extractVersion(output: string): string | undefined {
  return VERSION_PATTERN.exec(output)?.[1];
}

export async function checkBinary(
  runner: CommandRunner,
  requirement: BinaryRequirement,
  logger: Logger,
): Promise<Result<BinaryStatus>> {
  const { name, versionArgs, minVersion, installHint } = requirement;
  const command = formatCommand([name, ...versionArgs]);
  const outcome = await runner.run(name, versionArgs, { timeout: DEFAULT_TIMEOUTS.versionCheck });

  if (outcome.notFound) {
    return Failure(`${name} not found in PATH`, {
      message: `${name} is required but was not found`,
      resolution: installHint,
      command,
      code: ERROR_CODES.dependencyMissing,
    });
  }

  const version = extractVersion(`${outcome.stdout}\n${outcome.stderr}`);
  if (outcome.exitCode !== 0 || version === undefined) {
    const warning = `Unable to verify ${name} version`;
    logger.warn({ name, exitCode: outcome.exitCode }, warning);
    return Success({ name, warning });
  }

  if (minVersion !== undefined && compareVersions(version, minVersion) < 0) {
    return Failure(`Incorrect ${name} version. Found ${version}, require >= ${minVersion}`, {
      message: `${name} ${version} is older than the supported minimum`,
      hint: `Minimum supported version is ${minVersion}`,
      resolution: `Upgrade ${name}. ${installHint}`,
      command,
      code: ERROR_CODES.dependencyMissing,
      details: { found: version, required: minVersion },
    });
  }

  logger.debug({ name, version }, 'Binary available');
  return Success({ name, version });
}

/**
 * Confirm kubectl can reach the cluster in the current context.
 */
export async function checkClusterAccess(runner: CommandRunner, logger: Logger): Promise<Result<void>> {
  const argv = ['kubectl', 'get', 'nodes'];
  const outcome = await runner.run('kubectl', argv.slice(1), { timeout: DEFAULT_TIMEOUTS.clusterQuery });

  if (outcome.exitCode === 0) {
    logger.debug('Cluster reachable');
    return Success(undefined);
  }

  const reason = outcome.timedOut ? 'timed out' : outcome.stderr.trim() || 'kubectl failed';
  return Failure(`Unable to reach the cluster: ${reason}`, {
    message: 'Unable to reach the Kubernetes cluster',
    hint: reason,
    resolution: 'Check KUBECONFIG and the current kubectl context',
    command: formatCommand(argv),
    code: ERROR_CODES.clusterQuery,
  });
}
