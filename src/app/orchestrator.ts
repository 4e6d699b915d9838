/**
 * Deployment Orchestrator
 *
 * Runs the workflow tools in order and turns their results into an exit code:
 *
 *   install / upgrade: prerequisites → saved state → region → connectivity →
 *                      credentials and answers → save → mirror → plan
 *   uninstall:         prerequisites → namespace → plan → config removal
 *
 * Each stage gates the next. The saved state is removed only after an
 * install or upgrade plan has been emitted, so a failed run can resume.
 * An interrupt only changes the outcome of a run that has not finished.
 */

import type { z, ZodTypeAny } from 'zod';
import type { Logger } from 'pino';
import { COMPONENTS } from '@/config/components';
import { ENV_VARS, EXIT_CODES, type ExitCode } from '@/config/constants';
import type { RuntimeConfig } from '@/config/index';
import { createToolContext, type ToolContext } from '@/core/context';
import type { Services } from '@/core/services';
import type { ConfigStore } from '@/infra/state/config-store';
import { ERROR_MESSAGES, extractErrorMessage } from '@/lib/errors';
import { logToolComplete, logToolFailure, logToolStart } from '@/lib/runtime-logging';
import {
  checkConnectivityTool,
  checkPrerequisitesTool,
  mirrorImageTool,
  planDeploymentTool,
} from '@/tools';
import { renderCommandLines } from '@/tools/plan-deployment/commands';
import type { PlanDeploymentResult } from '@/tools/plan-deployment/tool';
import {
  Success,
  Failure,
  ERROR_CODES,
  type DeploymentAction,
  type FailureResult,
  type Result,
  type WizardConfig,
} from '@/types';
import type { Tool } from '@/types/tool';
import type { InputSource, WizardOverrides } from './input-source';
import { askUninstallNamespace, startWizard } from './wizard';

export interface OrchestratorOptions {
  action: DeploymentAction;
  runtime: RuntimeConfig;
  input: InputSource;
  overrides: WizardOverrides;
  services: Services;
  store: ConfigStore;
  logger: Logger;
  signal?: AbortSignal;
  /** Receives the command plan, one command per line */
  output: (line: string) => void;
  /** Receives human status lines */
  status: (line: string) => void;
}

export interface RunOutcome {
  exitCode: ExitCode;
  plan?: PlanDeploymentResult;
  failure?: FailureResult;
}

/**
 * Validate input against the tool schema, then run its handler with logging.
 */
async function runTool<TSchema extends ZodTypeAny, TOut>(
  tool: Tool<TSchema, TOut>,
  params: z.input<TSchema>,
  ctx: ToolContext,
): Promise<Result<TOut>> {
  const parsed = tool.schema.safeParse(params);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    const message = `Invalid input for ${tool.name}: ${issues}`;
    logToolFailure(tool.name, message, ctx.logger);
    return Failure(message, { message, code: ERROR_CODES.userInput });
  }

  const startTime = Date.now();
  logToolStart(tool.name, { input: parsed.data }, ctx.logger);
  try {
    const result = await tool.handler(parsed.data, ctx);
    if (result.ok) {
      logToolComplete(tool.name, {}, ctx.logger, Date.now() - startTime);
    } else {
      logToolFailure(tool.name, result.error, ctx.logger, {
        ...(result.guidance?.code && { code: result.guidance.code }),
      });
      if (result.guidance && tool.chainHints && !result.guidance.resolution) {
        result.guidance.resolution = tool.chainHints.failure;
      }
    }
    return result;
  } catch (error) {
    const message = extractErrorMessage(error);
    logToolFailure(tool.name, message, ctx.logger);
    return Failure(`${tool.name} failed unexpectedly: ${message}`);
  }
}

export function createDeploymentOrchestrator(options: OrchestratorOptions) {
  const { action, runtime, input, overrides, services, store, logger, signal, output, status } = options;

  const ctx = createToolContext(logger, services, {
    ...(signal !== undefined && { signal }),
    progress: async (message, progress, total) => {
      const step = progress !== undefined && total !== undefined ? `[${progress}/${total}] ` : '';
      status(`   ${step}${message}`);
    },
  });

  const interrupted = (): boolean => signal?.aborted === true;

  const finish = (result: Result<unknown>): RunOutcome => {
    if (result.ok) {
      return { exitCode: EXIT_CODES.SUCCESS };
    }
    if (interrupted()) {
      status('\n🛑 Interrupted. No cluster changes were made.');
      return { exitCode: EXIT_CODES.INTERRUPTED };
    }
    return { exitCode: EXIT_CODES.FAILURE, failure: result };
  };

  const stopIfInterrupted = (stage: string): Result<never> | undefined =>
    interrupted() ? Failure(`Interrupted before ${stage}`) : undefined;

  const warnAll = (warnings: readonly string[]): void => {
    for (const warning of warnings) status(`⚠️  ${warning}`);
  };

  /**
   * Saved answers, or null when there are none or they cannot be read.
   */
  async function loadSaved(): Promise<WizardConfig | null> {
    const loaded = await store.load();
    if (loaded.ok) {
      return loaded.value;
    }
    logger.warn({ path: store.path, error: loaded.error }, 'Ignoring unreadable saved configuration');
    status(`⚠️  ${loaded.error}. Starting the wizard fresh.`);
    return null;
  }

  function emitPlan(plan: PlanDeploymentResult): void {
    status(`\n${plan.summary}`);
    warnAll(plan.warnings);
    if (plan.valuesFile) {
      status(`📄 Helm values written to ${plan.valuesFile}`);
    }
    if (plan.commands.length === 0) {
      return;
    }
    status('\n📋 Review and run these commands in order:\n');
    for (const line of renderCommandLines(plan.commands)) {
      output(line);
    }
  }

  async function deploy(): Promise<RunOutcome> {
    const prerequisites = await runTool(checkPrerequisitesTool, { action }, ctx);
    if (!prerequisites.ok) return finish(prerequisites);
    status(prerequisites.value.summary);
    warnAll(prerequisites.value.warnings);

    const saved = await loadSaved();
    const session = await startWizard({ input, overrides, action, component: runtime.component, saved, logger });
    if (!session.ok) return finish(session);

    const connectivity = await runTool(checkConnectivityTool, { region: session.value.region }, ctx);
    if (!connectivity.ok) return finish(connectivity);
    status(connectivity.value.summary);

    const beforeAnswers = stopIfInterrupted('credential prompts');
    if (beforeAnswers) return finish(beforeAnswers);

    const config = await session.value.complete();
    if (!config.ok) return finish(config);

    const answers = config.value;
    const { clientSecret } = answers;
    if (clientSecret === undefined) {
      return finish(
        Failure(ERROR_MESSAGES.MISSING_SECRET, {
          message: ERROR_MESSAGES.MISSING_SECRET,
          resolution: `Set ${ENV_VARS.CLIENT_SECRET} or answer the prompt`,
          code: ERROR_CODES.userInput,
        }),
      );
    }

    const savedTo = await store.save(answers, { persistSecret: runtime.persistSecret });
    if (savedTo.ok) {
      const scope = runtime.persistSecret ? ' (including the client secret)' : '';
      status(`💾 Configuration saved to ${savedTo.value}${scope}`);
    } else {
      logger.warn({ error: savedTo.error }, 'Configuration not saved');
      status(`⚠️  ${savedTo.error}. A failed run will not be resumable.`);
    }

    const result = await store.withSavedState(async (): Promise<Result<PlanDeploymentResult>> => {
      const beforeMirror = stopIfInterrupted('image mirror');
      if (beforeMirror) return beforeMirror;

      status(`\n📦 Mirroring ${COMPONENTS[runtime.component].title} image to ${answers.localRegistry}`);
      const mirror = await runTool(
        mirrorImageTool,
        {
          component: runtime.component,
          cid: answers.cid,
          clientId: answers.clientId,
          clientSecret,
          region: answers.region,
          localRegistry: answers.localRegistry,
          imageTag: answers.imageTag,
        },
        ctx,
      );
      if (!mirror.ok) return mirror;
      status(mirror.value.summary);
      warnAll(mirror.value.warnings);

      const beforePlan = stopIfInterrupted('deployment planning');
      if (beforePlan) return beforePlan;

      const planned = await runTool(
        planDeploymentTool,
        {
          action,
          component: runtime.component,
          namespace: answers.namespace,
          cid: answers.cid,
          settings: answers.settings,
          clientId: answers.clientId,
          clientSecret,
          region: answers.region,
          image: mirror.value.image.target,
          registryConfigJSON: mirror.value.registryConfigJSON,
          valuesFile: runtime.valuesFile,
        },
        ctx,
      );
      if (!planned.ok) return planned;

      const beforeEmit = stopIfInterrupted('plan output');
      if (beforeEmit) return beforeEmit;

      emitPlan(planned.value);
      return Success(planned.value);
    });

    return result.ok ? { ...finish(result), plan: result.value } : finish(result);
  }

  async function uninstall(): Promise<RunOutcome> {
    const prerequisites = await runTool(checkPrerequisitesTool, { action }, ctx);
    if (!prerequisites.ok) return finish(prerequisites);
    status(prerequisites.value.summary);
    warnAll(prerequisites.value.warnings);

    const saved = await loadSaved();
    const namespace = await askUninstallNamespace({ input, overrides, component: runtime.component, saved, logger });
    if (!namespace.ok) return finish(namespace);

    const removeNamespace = await input.confirm({
      message: `Also delete namespace '${namespace.value}'?`,
      default: false,
    });
    if (!removeNamespace.ok) return finish(removeNamespace);

    const planned = await runTool(
      planDeploymentTool,
      {
        action,
        component: runtime.component,
        namespace: namespace.value,
        valuesFile: runtime.valuesFile,
        removeNamespace: removeNamespace.value,
      },
      ctx,
    );
    if (!planned.ok) return finish(planned);
    emitPlan(planned.value);

    if (saved !== null) {
      const removeConfig = await input.confirm({
        message: 'Remove the saved configuration file?',
        default: false,
      });
      if (!removeConfig.ok) return finish(removeConfig);
      if (removeConfig.value) {
        const removed = await store.delete();
        if (!removed.ok) return finish(removed);
        status(`✅ Removed ${store.path}`);
      }
    }

    return { ...finish(Success(undefined)), plan: planned.value };
  }

  return {
    run(): Promise<RunOutcome> {
      return action === 'uninstall' ? uninstall() : deploy();
    },
  };
}

export type DeploymentOrchestrator = ReturnType<typeof createDeploymentOrchestrator>;
