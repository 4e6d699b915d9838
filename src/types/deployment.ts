/**
 * Domain model for the sensor deployment workflow.
 */

import type { CloudRegionId } from '@/config/regions';

export const SENSOR_BACKENDS = ['bpf', 'kernel'] as const;
export type SensorBackend = (typeof SENSOR_BACKENDS)[number];

/** `watcher` runs one deployment per cluster; `socket` a daemonset on every node */
export const IAR_MODES = ['watcher', 'socket'] as const;
export type IarMode = (typeof IAR_MODES)[number];

export const CONTAINER_RUNTIMES = ['docker', 'podman', 'containerd', 'crio'] as const;
export type ContainerRuntime = (typeof CONTAINER_RUNTIMES)[number];

/**
 * Answers specific to the component being deployed.
 */
export type ComponentSettings =
  | { component: 'sensor'; backend: SensorBackend }
  | { component: 'kac'; clusterName: string }
  | {
      component: 'iar';
      clusterName: string;
      iarMode: IarMode;
      /** Socket mode only */
      iarRuntime?: ContainerRuntime | undefined;
    };

export const DEPLOYMENT_ACTIONS = ['install', 'upgrade', 'uninstall'] as const;
export type DeploymentAction = (typeof DEPLOYMENT_ACTIONS)[number];

/**
 * Answers collected by the wizard.
 *
 * `clientSecret` is absent unless the operator supplied it this run or opted
 * into persisting it.
 */
export interface WizardConfig {
  cid: string;
  clientId: string;
  clientSecret?: string;
  region: CloudRegionId;
  localRegistry: string;
  imageTag: string;
  namespace: string;
  settings: ComponentSettings;
  action: DeploymentAction;
}

/**
 * OAuth2 access token held in process memory only.
 */
export interface OAuthToken {
  accessToken: string;
  /** Epoch milliseconds */
  expiresAt: number;
  scopes: string[];
}

export interface ImageLocation {
  repository: string;
  tag: string;
}

/**
 * Source (vendor) and target (local) locations of the mirrored image.
 */
export interface ImageReference {
  source: ImageLocation;
  target: ImageLocation;
}

export function formatImage(location: ImageLocation): string {
  return `${location.repository}:${location.tag}`;
}

export type ClusterState =
  | { kind: 'NotPresent' }
  | { kind: 'Present' }
  | { kind: 'Unknown'; query: string; reason: string };

export type PlannedAction = 'install' | 'upgrade' | 'uninstall' | 'noop';

export type CommandPhase = 'prepare' | 'deploy' | 'verify';

export interface PlanCommand {
  description: string;
  argv: string[];
  phase: CommandPhase;
}

export interface DeploymentPlan {
  action: PlannedAction;
  commands: PlanCommand[];
  valuesFile?: string;
  warnings: string[];
}
