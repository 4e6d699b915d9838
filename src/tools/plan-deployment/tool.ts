/**
 * Plan Deployment Tool
 *
 * Queries the cluster for an existing release, picks the action from the
 * decision table, renders the values file and returns the ordered command
 * plan. The plan is printed for the operator; nothing here mutates the
 * cluster.
 */

import { chmod, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { COMPONENTS } from '@/config/components';
import { setupToolContext } from '@/lib/tool-helpers';
import { extractErrorMessage } from '@/lib/errors';
import { compareVersions } from '@/lib/validation';
import {
  Success,
  Failure,
  ERROR_CODES,
  type ClusterState,
  type DeploymentPlan,
  type PlanCommand,
  type Result,
} from '@/types';
import type { ToolContext } from '@/core/context';
import { tool } from '@/types/tool';
import { decideAction } from './decision';
import {
  helmDeployCommand,
  namespaceCommands,
  releaseTarget,
  repoAddCommand,
  repoUpdateCommand,
  uninstallCommands,
  verifyCommands,
  workloadKind,
  type ReleaseTarget,
} from './commands';
import { buildValues, renderValuesYaml, type ApiAccess } from './values';
import { planDeploymentSchema, type PlanDeploymentParams } from './schema';

export interface PlanDeploymentResult extends DeploymentPlan {
  summary: string;
  clusterState: ClusterState;
}

async function writeValuesFile(path: string, content: string): Promise<Result<string>> {
  try {
    await mkdir(dirname(path), { recursive: true, mode: 0o700 });
    await writeFile(path, content, { encoding: 'utf-8', mode: 0o600 });
    await chmod(path, 0o600);
    return Success(path);
  } catch (error) {
    const message = `Failed to write Helm values to ${path}: ${extractErrorMessage(error)}`;
    return Failure(message, {
      message,
      resolution: 'Check permissions or choose another directory with --config-dir',
      code: ERROR_CODES.userInput,
    });
  }
}

async function upgradeWarning(
  ctx: ToolContext,
  target: ReleaseTarget,
  tagPath: readonly string[],
  targetTag: string,
): Promise<string | undefined> {
  const installed = await ctx.services.helm.getInstalledImageTag(target.release, target.namespace, tagPath);
  if (installed === undefined) {
    return `Installed image tag could not be read; upgrading to ${targetTag}`;
  }
  if (compareVersions(targetTag, installed) <= 0) {
    return `Installed image tag ${installed} is not older than target ${targetTag}; the upgrade may be a no-op`;
  }
  return undefined;
}

async function handlePlanDeployment(
  input: PlanDeploymentParams,
  ctx: ToolContext,
): Promise<Result<PlanDeploymentResult>> {
  const { logger, timer } = setupToolContext(ctx, 'plan-deployment');
  const profile = COMPONENTS[input.component];
  const target = releaseTarget(input.component, input.namespace);

  const clusterState = await ctx.services.helm.detectClusterState(target.release, target.namespace);
  const decision = decideAction(input.action, clusterState);
  if (!decision.ok) {
    timer.error(decision.error);
    return decision;
  }

  const { action, warning } = decision.value;
  const warnings = warning === undefined ? [] : [warning];
  logger.debug({ requested: input.action, state: clusterState.kind, action }, 'Planned action decided');

  if (action === 'noop') {
    timer.end({ action });
    return Success({
      summary: `ℹ️  Release '${target.release}' is not installed in '${target.namespace}'. Nothing to do.`,
      action,
      commands: [],
      warnings,
      clusterState,
    });
  }

  if (action === 'uninstall') {
    const commands = uninstallCommands(target, input.removeNamespace);
    timer.end({ action, commands: commands.length });
    return Success({
      summary: `🗑️  Uninstall plan for '${target.release}' in '${target.namespace}'`,
      action,
      commands,
      warnings,
      clusterState,
    });
  }

  const { cid, settings, image } = input;
  if (cid === undefined || settings === undefined || image === undefined) {
    const error = 'Install and upgrade plans need the CID, component settings and mirrored image';
    timer.error(error);
    return Failure(error, {
      message: error,
      resolution: 'Mirror the image before planning the deployment',
      code: ERROR_CODES.userInput,
    });
  }
  if (settings.component !== input.component) {
    const error = `Settings for '${settings.component}' cannot plan a '${input.component}' release`;
    timer.error(error);
    return Failure(error, { message: error, code: ERROR_CODES.userInput });
  }

  const api: ApiAccess | undefined =
    input.clientId !== undefined && input.clientSecret !== undefined && input.region !== undefined
      ? { clientId: input.clientId, clientSecret: input.clientSecret, region: input.region }
      : undefined;
  const values = buildValues({
    cid,
    image,
    settings,
    ...(input.registryConfigJSON !== undefined && { registryConfigJSON: input.registryConfigJSON }),
    ...(api !== undefined && { api }),
  });
  if (!values.ok) {
    timer.error(values.error);
    return values;
  }
  const written = await writeValuesFile(input.valuesFile, renderValuesYaml(values.value));
  if (!written.ok) {
    timer.error(written.error);
    return written;
  }

  let commands: PlanCommand[];
  if (action === 'install') {
    commands = [
      repoAddCommand(),
      repoUpdateCommand(),
      ...namespaceCommands(target.namespace, profile.labelNamespace),
      helmDeployCommand('install', target, input.valuesFile),
      ...verifyCommands(target, workloadKind(settings)),
    ];
  } else {
    const tagWarning = await upgradeWarning(ctx, target, profile.imageTagPath, image.tag);
    if (tagWarning !== undefined) warnings.push(tagWarning);
    commands = [
      repoUpdateCommand(),
      helmDeployCommand('upgrade', target, input.valuesFile),
      ...verifyCommands(target, workloadKind(settings)),
    ];
  }

  timer.end({ action, commands: commands.length, valuesFile: input.valuesFile });
  return Success({
    summary: `🚀 ${action === 'install' ? 'Install' : 'Upgrade'} plan for '${target.release}' in '${target.namespace}'`,
    action,
    commands,
    valuesFile: input.valuesFile,
    warnings,
    clusterState,
  });
}

export default tool({
  name: 'plan-deployment',
  description: 'Decide install, upgrade or uninstall and emit the Helm command plan',
  schema: planDeploymentSchema,
  handler: handlePlanDeployment,
  chainHints: {
    success: 'Review the plan, then run the commands in order.',
    failure: 'Resolve the cluster query failure and rerun.',
  },
});
