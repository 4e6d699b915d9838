/**
 * Persisted wizard state
 *
 * One JSON file per operator holds the last successful wizard answers so a
 * failed run can resume without re-entering everything. The client secret is
 * written only when the operator opts in.
 */

import { mkdir, readFile, rm, writeFile, chmod } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { Logger } from 'pino';
import { STATE } from '@/config/constants';
import { cloudRegionIdSchema } from '@/config/regions';
import { ERROR_MESSAGES, extractErrorMessage } from '@/lib/errors';
import { componentSettings } from '@/tools/shared/schemas';
import { Success, Failure, ERROR_CODES, type Result, DEPLOYMENT_ACTIONS, type WizardConfig } from '@/types';

export const persistedStateSchema = z.object({
  schemaVersion: z.literal(STATE.SCHEMA_VERSION),
  cid: z.string().min(1),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1).optional(),
  region: cloudRegionIdSchema,
  localRegistry: z.string().min(1),
  imageTag: z.string().min(1),
  namespace: z.string().min(1),
  settings: componentSettings,
  action: z.enum(DEPLOYMENT_ACTIONS),
});

export type PersistedState = z.infer<typeof persistedStateSchema>;

export interface SaveOptions {
  persistSecret: boolean;
}

export interface ConfigStore {
  /** Canonical state file location */
  readonly path: string;

  /**
   * Load saved answers. Missing file yields `null`; unreadable content yields
   * a `ConfigCorrupt` failure.
   */
  load(): Promise<Result<WizardConfig | null>>;

  /**
   * Write answers, omitting the secret unless `persistSecret` is set.
   * @returns the path written
   */
  save(config: WizardConfig, options: SaveOptions): Promise<Result<string>>;

  /** Remove the state file. A missing file is not an error. */
  delete(): Promise<Result<void>>;

  /**
   * Run `fn` with the saved state in place; delete the state file only when
   * `fn` succeeds, so a failed run can resume.
   */
  withSavedState<T>(fn: () => Promise<Result<T>>): Promise<Result<T>>;
}

export interface ConfigStoreOptions {
  path: string;
  logger: Logger;
}

export function toPersistedState(config: WizardConfig, options: SaveOptions): PersistedState {
  const state: PersistedState = {
    schemaVersion: STATE.SCHEMA_VERSION,
    cid: config.cid,
    clientId: config.clientId,
    region: config.region,
    localRegistry: config.localRegistry,
    imageTag: config.imageTag,
    namespace: config.namespace,
    settings: config.settings,
    action: config.action,
  };
  if (options.persistSecret && config.clientSecret) {
    state.clientSecret = config.clientSecret;
  }
  return state;
}

function fromPersistedState(state: PersistedState): WizardConfig {
  const { schemaVersion: _version, clientSecret, ...fields } = state;
  return clientSecret === undefined ? fields : { ...fields, clientSecret };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function createConfigStore({ path, logger }: ConfigStoreOptions): ConfigStore {
  const corrupt = (reason: string): Result<WizardConfig | null> =>
    Failure(`Saved configuration at ${path} is unreadable: ${reason}`, {
      message: ERROR_MESSAGES.CONFIG_UNREADABLE,
      hint: reason,
      resolution: 'The wizard will start fresh; the file is overwritten on the next successful pass',
      code: ERROR_CODES.configCorrupt,
      details: { path },
    });

  const store: ConfigStore = {
    path,

    async load() {
      let raw: string;
      try {
        raw = await readFile(path, 'utf-8');
      } catch (error) {
        if (isMissingFile(error)) {
          logger.debug({ path }, 'No saved configuration');
          return Success(null);
        }
        return corrupt(extractErrorMessage(error));
      }

      let data: unknown;
      try {
        data = JSON.parse(raw);
      } catch (error) {
        return corrupt(`invalid JSON (${extractErrorMessage(error)})`);
      }

      const parsed = persistedStateSchema.safeParse(data);
      if (!parsed.success) {
        const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)');
        return corrupt(`unexpected content in ${[...new Set(fields)].join(', ')}`);
      }

      logger.debug({ path, hasSecret: parsed.data.clientSecret !== undefined }, 'Loaded saved configuration');
      return Success(fromPersistedState(parsed.data));
    },

    async save(config, options) {
      try {
        await mkdir(dirname(path), { recursive: true, mode: 0o700 });
        const state = toPersistedState(config, options);
        await writeFile(path, `${JSON.stringify(state, null, 2)}\n`, { encoding: 'utf-8', mode: 0o600 });
        await chmod(path, 0o600);
        logger.debug({ path, persistSecret: options.persistSecret }, 'Saved configuration');
        return Success(path);
      } catch (error) {
        const message = `Failed to save configuration to ${path}: ${extractErrorMessage(error)}`;
        return Failure(message, {
          message,
          hint: 'The configuration directory is not writable',
          resolution: 'Check permissions or choose another directory with --config-dir',
          code: ERROR_CODES.userInput,
        });
      }
    },

    async delete() {
      try {
        await rm(path, { force: true });
        logger.debug({ path }, 'Removed saved configuration');
        return Success(undefined);
      } catch (error) {
        const message = `Failed to remove ${path}: ${extractErrorMessage(error)}`;
        return Failure(message, {
          message,
          resolution: `Remove the file manually`,
          command: `rm -f ${path}`,
          code: ERROR_CODES.userInput,
        });
      }
    },

    async withSavedState(fn) {
      const result = await fn();
      if (!result.ok) {
        logger.info({ path }, 'Keeping saved configuration for resume');
        return result;
      }
      const removed = await store.delete();
      if (!removed.ok) {
        logger.warn({ path, error: removed.error }, 'Could not remove saved configuration');
      }
      return result;
    },
  };

  return store;
}
