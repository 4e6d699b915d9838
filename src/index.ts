/**
 * Programmatic API
 *
 * The CLI is the primary entry point; these exports let the workflow run
 * embedded with custom input sources and collaborators.
 *
 * @example
 * ```typescript
 * import { runCli } from 'sensor-helm-prep';
 *
 * const exitCode = await runCli(['--non-interactive', '--region', 'eu-1']);
 * ```
 */

export { runCli, createProgram, type CliDependencies } from './cli/cli';

export {
  createDeploymentOrchestrator,
  createServices,
  createInteractiveInput,
  createNonInteractiveInput,
  collectOverrides,
  startWizard,
  type InputSource,
  type OrchestratorOptions,
  type RunOutcome,
  type WizardOverrides,
} from './app';

export { loadRuntimeConfig, type RuntimeConfig } from './config/index';
export { CLOUD_REGIONS, resolveRegion, type CloudRegion, type CloudRegionId } from './config/regions';
export { createConfigStore, type ConfigStore } from './infra/state/config-store';
export { checkConnectivity, type ConnectivityReport, type ProbeFn } from './infra/network/connectivity';
export { createAuthClient, type AuthClient } from './infra/vendor/auth-client';
export { decideAction, DECISION_TABLE } from './tools/plan-deployment/decision';
export { ALL_TOOLS, TOOL_NAME, type ToolName } from './tools';

export type { Services } from './core/services';
export type { ToolContext } from './core/context';
export type {
  Result,
  ErrorCode,
  ErrorGuidance,
  WizardConfig,
  DeploymentPlan,
  PlanCommand,
  ClusterState,
  ImageReference,
} from './types';
export { Success, Failure, ERROR_CODES } from './types';
