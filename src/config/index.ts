/**
 * Runtime configuration
 *
 * Built once at startup from CLI flags and the environment, validated with
 * zod, then handed to every component. Nothing below the CLI reads
 * process-wide state.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { falconComponentSchema, valuesFileName } from './components';
import { ENV_VARS, STATE, WIZARD_DEFAULTS, logLevelSchema } from './constants';

export const runtimeConfigSchema = z.object({
  component: falconComponentSchema,
  configDir: z.string().min(1),
  logLevel: logLevelSchema,
  interactive: z.boolean(),
  persistSecret: z.boolean(),
});

export interface RuntimeConfig extends z.infer<typeof runtimeConfigSchema> {
  /** Persisted wizard state */
  stateFile: string;
  /** Rendered Helm values of the selected component */
  valuesFile: string;
}

export interface RuntimeConfigInput {
  component?: string | undefined;
  configDir?: string | undefined;
  logLevel?: string | undefined;
  interactive?: boolean | undefined;
  persistSecret?: boolean | undefined;
}

/**
 * Default per-user configuration directory.
 */
export function defaultConfigDir(home: string = homedir()): string {
  return join(home, ...STATE.DIR_SEGMENTS);
}

/**
 * Resolve runtime configuration. Flags win over the environment, the
 * environment over defaults.
 *
 * @throws ZodError when a value is invalid (e.g. unknown log level or component)
 */
export function loadRuntimeConfig(
  input: RuntimeConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): RuntimeConfig {
  const parsed = runtimeConfigSchema.parse({
    component: input.component ?? WIZARD_DEFAULTS.component,
    configDir: input.configDir ?? env[ENV_VARS.CONFIG_DIR] ?? defaultConfigDir(),
    logLevel: input.logLevel ?? env[ENV_VARS.LOG_LEVEL] ?? 'warn',
    interactive: input.interactive ?? true,
    persistSecret: input.persistSecret ?? false,
  });

  return {
    ...parsed,
    stateFile: join(parsed.configDir, STATE.FILE_NAME),
    valuesFile: join(parsed.configDir, valuesFileName(parsed.component)),
  };
}
