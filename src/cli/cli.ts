#!/usr/bin/env node
/**
 * Sensor Helm Prep CLI
 * Mirrors a component image and prints the Helm command plan for review
 */

import { Command, CommanderError, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import {
  collectOverrides,
  createDeploymentOrchestrator,
  createInteractiveInput,
  createNonInteractiveInput,
  createServices,
  type InputSource,
} from '@/app';
import { loadRuntimeConfig, type RuntimeConfig } from '@/config/index';
import { ENV_VARS, EXIT_CODES, STATE } from '@/config/constants';
import { FALCON_COMPONENTS } from '@/config/components';
import { CLOUD_REGION_IDS } from '@/config/regions';
import type { Services } from '@/core/services';
import { createConfigStore } from '@/infra/state/config-store';
import { extractErrorMessage } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { installInterruptHandler, logRunFailure, logStartup } from '@/lib/runtime-logging';
import { CONTAINER_RUNTIMES, IAR_MODES, SENSOR_BACKENDS, type DeploymentAction } from '@/types';
import { provideContextualGuidance } from './guidance';

const APP_NAME = 'sensor-helm-prep';

const packageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  // src/cli and dist/cli both sit two levels below the package root
  const parsed = packageJsonSchema.safeParse(
    JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8')),
  );
  return parsed.success ? parsed.data.version : '0.0.0';
}

const cliOptionsSchema = z.object({
  persistSecret: z.boolean().optional(),
  uninstall: z.boolean().optional(),
  upgrade: z.boolean().optional(),
  nonInteractive: z.boolean().optional(),
  yes: z.boolean().optional(),
  component: z.string().optional(),
  configDir: z.string().optional(),
  logLevel: z.string().optional(),
  region: z.string().optional(),
  namespace: z.string().optional(),
  backend: z.string().optional(),
  clusterName: z.string().optional(),
  iarMode: z.string().optional(),
  iarRuntime: z.string().optional(),
  dockerSocket: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export function createProgram(version: string): Command {
  return new Command()
    .name(APP_NAME)
    .description('Mirror a component image into a local registry and print the Helm deployment plan')
    .version(version)
    .option('--persist-secret', 'save the API client secret with the other answers')
    .option('--no-persist-secret', 'never save the API client secret (default)')
    .addOption(new Option('--component <name>', 'component to deploy').choices(FALCON_COMPONENTS).default('sensor'))
    .addOption(new Option('--uninstall', 'plan removal of the component release').conflicts('upgrade'))
    .option('--upgrade', 'plan an upgrade of the installed release')
    .option('--non-interactive', 'never prompt; answers come from flags, environment and saved state')
    .option('-y, --yes', 'answer yes to confirmations in non-interactive mode')
    .option('--config-dir <dir>', 'directory for saved answers and the values file')
    .option('--log-level <level>', 'logging level: fatal, error, warn, info, debug, trace, silent')
    .addOption(new Option('--region <id>', 'cloud region').choices(CLOUD_REGION_IDS))
    .option('--namespace <namespace>', 'Kubernetes namespace of the release')
    .addOption(new Option('--backend <mode>', 'sensor backend').choices(SENSOR_BACKENDS))
    .option('--cluster-name <name>', 'cluster name for the admission controller and image analyzer')
    .addOption(new Option('--iar-mode <mode>', 'image analyzer mode').choices(IAR_MODES))
    .addOption(new Option('--iar-runtime <runtime>', 'node container runtime in socket mode').choices(CONTAINER_RUNTIMES))
    .option('--docker-socket <path>', 'Docker daemon socket path')
    .option('--verbose', 'print structured error details')
    .addHelpText(
      'after',
      `

Examples:
  $ ${APP_NAME}                                 Run the wizard and plan an install
  $ ${APP_NAME} --upgrade                       Plan an upgrade to the selected tag
  $ ${APP_NAME} --component kac                 Plan an admission controller install
  $ ${APP_NAME} --uninstall                     Plan removal of the release
  $ ${APP_NAME} --non-interactive --region us-2 Use environment variables instead of prompts

The plan is printed to stdout, one command per line; nothing is run against the cluster.

Environment Variables:
  ${ENV_VARS.CID.padEnd(28)} Customer ID with checksum
  ${ENV_VARS.CLIENT_ID.padEnd(28)} API client id
  ${ENV_VARS.CLIENT_SECRET.padEnd(28)} API client secret
  ${ENV_VARS.CLOUD_REGION.padEnd(28)} Cloud region
  ${ENV_VARS.LOCAL_REGISTRY.padEnd(28)} Local registry host[:port]
  ${ENV_VARS.IMAGE_TAG.padEnd(28)} Image tag or "latest"
  ${ENV_VARS.CLUSTER_NAME.padEnd(28)} Cluster name (kac, iar)
  ${ENV_VARS.LOG_LEVEL.padEnd(28)} Logging level
  ${ENV_VARS.CONFIG_DIR.padEnd(28)} Directory for ${STATE.FILE_NAME}
`,
    );
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  /** Plan lines */
  stdout?: (line: string) => void;
  /** Status and error lines */
  stderr?: (line: string) => void;
  /** Replaces individual production collaborators */
  services?: Partial<Services>;
  /** Replaces the prompt source chosen from the flags */
  input?: InputSource;
  /** Skip SIGINT/SIGTERM handlers and the startup banner */
  embedded?: boolean;
}

function actionFrom(options: CliOptions): DeploymentAction {
  if (options.uninstall) return 'uninstall';
  if (options.upgrade) return 'upgrade';
  return 'install';
}

/**
 * Parse arguments and run the workflow.
 *
 * @param args - arguments after the executable and script
 * @returns the process exit code
 */
export async function runCli(args: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const stdout = deps.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
  const stderr = deps.stderr ?? ((line: string) => console.error(line));

  const version = readVersion();
  const program = createProgram(version)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => stderr(text.trimEnd()),
      writeErr: (text) => stderr(text.trimEnd()),
    });

  try {
    program.parse([...args], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURE;
    }
    throw error;
  }

  const options = cliOptionsSchema.parse(program.opts());
  const action = actionFrom(options);

  let runtime: RuntimeConfig;
  try {
    runtime = loadRuntimeConfig(
      {
        component: options.component,
        configDir: options.configDir,
        logLevel: options.logLevel,
        interactive: options.nonInteractive !== true,
        persistSecret: options.persistSecret,
      },
      env,
    );
  } catch (error) {
    stderr(`❌ Invalid configuration: ${extractErrorMessage(error)}`);
    return EXIT_CODES.FAILURE;
  }

  const logger = createLogger({ name: APP_NAME, level: runtime.logLevel });
  const controller = new AbortController();
  const removeInterruptHandler =
    deps.embedded === true
      ? () => undefined
      : installInterruptHandler(controller, logger, EXIT_CODES.INTERRUPTED);

  logStartup(
    {
      appName: APP_NAME,
      version,
      configDir: runtime.configDir,
      logLevel: runtime.logLevel,
      action,
      interactive: runtime.interactive,
    },
    logger,
    deps.embedded === true,
  );

  const input =
    deps.input ??
    (runtime.interactive
      ? createInteractiveInput({ signal: controller.signal, onInterrupt: () => controller.abort() })
      : createNonInteractiveInput({ assumeYes: options.yes === true }));

  try {
    const orchestrator = createDeploymentOrchestrator({
      action,
      runtime,
      input,
      overrides: collectOverrides(env, options),
      services: createServices(
        { logger, ...(options.dockerSocket !== undefined && { dockerSocket: options.dockerSocket }) },
        deps.services,
      ),
      store: createConfigStore({ path: runtime.stateFile, logger }),
      logger,
      signal: controller.signal,
      output: stdout,
      status: stderr,
    });

    const outcome = await orchestrator.run();
    if (outcome.failure) {
      logRunFailure(outcome.failure.error, logger, {
        action,
        ...(outcome.failure.guidance?.code && { code: outcome.failure.guidance.code }),
      });
      provideContextualGuidance(outcome.failure, {
        write: stderr,
        ...(options.verbose === true && { verbose: true }),
      });
    }
    return outcome.exitCode;
  } finally {
    removeInterruptHandler();
  }
}

if (require.main === module) {
  void runCli(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error(`❌ ${extractErrorMessage(error)}`);
      process.exit(EXIT_CODES.FAILURE);
    },
  );
}
