/**
 * Input sources
 *
 * The wizard asks every question through an `InputSource`, chosen once at
 * startup: the terminal (see `interactive-input.ts`) or the non-interactive
 * source below, which answers from defaults and fails on anything it cannot
 * answer. Environment and flag overrides are applied by the wizard before a
 * question is asked, so both sources see the same flow.
 */

import { ENV_VARS } from '@/config/constants';
import { Success, Failure, ERROR_CODES, type Result } from '@/types';

export interface TextQuestion {
  /** Field label used in error messages */
  name: string;
  message: string;
  default?: string;
  /** Mask the answer */
  secret?: boolean;
  /** Returns the problem with a value, or undefined when it is acceptable */
  validate?: (value: string) => string | undefined;
  /** How to supply the value without a prompt, e.g. an environment variable */
  source?: string;
}

export interface SelectQuestion<T extends string> {
  name: string;
  message: string;
  choices: readonly T[];
  default?: T;
  source?: string;
}

export interface ConfirmQuestion {
  message: string;
  default: boolean;
}

export interface InputSource {
  readonly interactive: boolean;
  text(question: TextQuestion): Promise<Result<string>>;
  select<T extends string>(question: SelectQuestion<T>): Promise<Result<T>>;
  confirm(question: ConfirmQuestion): Promise<Result<boolean>>;
}

function missingValue<T>(name: string, source: string | undefined): Result<T> {
  const message = `No value for ${name} in non-interactive mode`;
  return Failure(message, {
    message,
    resolution: source ? `Provide it with ${source}` : 'Run interactively to answer the prompt',
    code: ERROR_CODES.userInput,
  });
}

export interface NonInteractiveOptions {
  /** Answer every confirmation with yes */
  assumeYes?: boolean;
}

/**
 * Answers from question defaults. Confirmations take their default unless
 * `assumeYes` is set.
 */
export function createNonInteractiveInput(options: NonInteractiveOptions = {}): InputSource {
  return {
    interactive: false,

    async text(question) {
      if (question.default === undefined || question.default === '') {
        return missingValue(question.name, question.source);
      }
      const issue = question.validate?.(question.default);
      if (issue !== undefined) {
        const message = `Invalid ${question.name}: ${issue}`;
        return Failure(message, { message, code: ERROR_CODES.userInput });
      }
      return Success(question.default);
    },

    async select(question) {
      if (question.default === undefined) {
        return missingValue(question.name, question.source);
      }
      return Success(question.default);
    },

    async confirm(question) {
      return Success(options.assumeYes === true ? true : question.default);
    },
  };
}

// ===== OVERRIDES =====

export const WIZARD_FIELDS = [
  'cid',
  'clientId',
  'clientSecret',
  'region',
  'localRegistry',
  'imageTag',
  'namespace',
  'backend',
  'clusterName',
  'iarMode',
  'iarRuntime',
] as const;

export type WizardField = (typeof WIZARD_FIELDS)[number];

/**
 * Raw values that replace wizard prompts. Validated by the wizard like any
 * typed answer.
 */
export type WizardOverrides = Partial<Record<WizardField, string>>;

export const OVERRIDE_ENV_VARS: Partial<Record<WizardField, string>> = {
  cid: ENV_VARS.CID,
  clientId: ENV_VARS.CLIENT_ID,
  clientSecret: ENV_VARS.CLIENT_SECRET,
  region: ENV_VARS.CLOUD_REGION,
  localRegistry: ENV_VARS.LOCAL_REGISTRY,
  imageTag: ENV_VARS.IMAGE_TAG,
  clusterName: ENV_VARS.CLUSTER_NAME,
};

export interface OverrideFlags {
  region?: string | undefined;
  namespace?: string | undefined;
  backend?: string | undefined;
  clusterName?: string | undefined;
  iarMode?: string | undefined;
  iarRuntime?: string | undefined;
}

const FLAG_FIELDS = ['region', 'namespace', 'backend', 'clusterName', 'iarMode', 'iarRuntime'] as const;

/**
 * Collect overrides from the environment and CLI flags. Flags win; empty
 * values are ignored.
 */
export function collectOverrides(env: NodeJS.ProcessEnv, flags: OverrideFlags = {}): WizardOverrides {
  const overrides: WizardOverrides = {};

  for (const field of WIZARD_FIELDS) {
    const envVar = OVERRIDE_ENV_VARS[field];
    const value = envVar === undefined ? undefined : env[envVar]?.trim();
    if (value) overrides[field] = value;
  }

  for (const field of FLAG_FIELDS) {
    const value = flags[field];
    if (value) overrides[field] = value;
  }

  return overrides;
}
