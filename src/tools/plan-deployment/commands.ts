/**
 * Command builders for deployment plans. Nothing here runs a command.
 */

import { COMPONENTS, type FalconComponent } from '@/config/components';
import { HELM, KUBERNETES } from '@/config/constants';
import { formatCommand } from '@/lib/command-runner';
import type { ComponentSettings, PlanCommand } from '@/types';

export interface ReleaseTarget {
  release: string;
  chart: string;
  namespace: string;
}

export type WorkloadKind = 'daemonset' | 'deployment';

export function releaseTarget(component: FalconComponent, namespace: string): ReleaseTarget {
  const { release, chart } = COMPONENTS[component];
  return { release, chart, namespace };
}

/**
 * Workload the chart rolls out. The image analyzer runs per node only in
 * socket mode.
 */
export function workloadKind(settings: ComponentSettings): WorkloadKind {
  switch (settings.component) {
    case 'sensor':
      return 'daemonset';
    case 'kac':
      return 'deployment';
    case 'iar':
      return settings.iarMode === 'socket' ? 'daemonset' : 'deployment';
  }
}

export function repoAddCommand(): PlanCommand {
  return {
    description: 'Add the sensor Helm repository',
    argv: ['helm', 'repo', 'add', HELM.REPO_NAME, HELM.REPO_URL],
    phase: 'prepare',
  };
}

export function repoUpdateCommand(): PlanCommand {
  return {
    description: 'Update Helm repositories',
    argv: ['helm', 'repo', 'update'],
    phase: 'prepare',
  };
}

export function namespaceCommands(namespace: string, label: boolean): PlanCommand[] {
  const create: PlanCommand = {
    description: `Create namespace '${namespace}'`,
    argv: ['kubectl', 'create', 'namespace', namespace],
    phase: 'prepare',
  };
  if (!label) {
    return [create];
  }
  return [
    create,
    ...KUBERNETES.POD_SECURITY_LABELS.map(
      (label): PlanCommand => ({
        description: `Label namespace '${namespace}' with ${label}`,
        argv: ['kubectl', 'label', 'ns', '--overwrite', namespace, label],
        phase: 'prepare',
      }),
    ),
  ];
}

export function helmDeployCommand(
  verb: 'install' | 'upgrade',
  target: ReleaseTarget,
  valuesFile: string,
): PlanCommand {
  return {
    description: `${verb === 'install' ? 'Install' : 'Upgrade'} Helm release '${target.release}'`,
    argv: ['helm', verb, target.release, target.chart, '-n', target.namespace, '-f', valuesFile],
    phase: 'deploy',
  };
}

export function verifyCommands(target: ReleaseTarget, kind: WorkloadKind): PlanCommand[] {
  const workload = `${kind}/${target.release}`;
  return [
    {
      description: `Wait for ${workload} to roll out`,
      argv: [
        'kubectl',
        'rollout',
        'status',
        workload,
        '-n',
        target.namespace,
        `--timeout=${KUBERNETES.ROLLOUT_TIMEOUT}`,
      ],
      phase: 'verify',
    },
    {
      description: `Show recent ${target.release} logs`,
      argv: [
        'kubectl',
        'logs',
        `-n=${target.namespace}`,
        '-l',
        `app.kubernetes.io/name=${target.release}`,
        `--tail=${KUBERNETES.LOGS_TAIL_LINES}`,
      ],
      phase: 'verify',
    },
  ];
}

export function uninstallCommands(target: ReleaseTarget, removeNamespace: boolean): PlanCommand[] {
  const commands: PlanCommand[] = [
    {
      description: `Uninstall Helm release '${target.release}'`,
      argv: ['helm', 'uninstall', target.release, '-n', target.namespace],
      phase: 'deploy',
    },
  ];
  if (removeNamespace) {
    commands.push({
      description: `Delete namespace '${target.namespace}'`,
      argv: ['kubectl', 'delete', 'namespace', target.namespace, '--ignore-not-found'],
      phase: 'deploy',
    });
  }
  return commands;
}

/**
 * One shell line per command, in plan order.
 */
export function renderCommandLines(commands: readonly PlanCommand[]): string[] {
  return commands.map((command) => formatCommand(command.argv));
}
