/**
 * Docker Credential Helper Integration
 *
 * Looks up credentials for the local registry the same way the Docker CLI
 * does (explicit `auths`, per-registry `credHelpers`, then `credsStore`), and
 * builds the base64 registry-config blob the Helm chart expects for its pull
 * secret.
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { spawn } from 'node:child_process';
import { z } from 'zod';
import type { Logger } from 'pino';
import { Success, Failure, ERROR_CODES, type Result } from '@/types';
import { extractErrorMessage } from '@/lib/errors';

const dockerConfigSchema = z.object({
  auths: z
    .record(
      z.object({
        auth: z.string().optional(),
        username: z.string().optional(),
        password: z.string().optional(),
      }),
    )
    .optional(),
  credsStore: z.string().optional(),
  credHelpers: z.record(z.string()).optional(),
});

/**
 * Docker configuration structure from ~/.docker/config.json
 */
export type DockerConfig = z.infer<typeof dockerConfigSchema>;

const credentialHelperResultSchema = z.object({
  ServerURL: z.string().min(1),
  Username: z.string().min(1),
  Secret: z.string().min(1),
});

/**
 * Credentials returned by credential helpers
 */
export type CredentialHelperResult = z.infer<typeof credentialHelperResultSchema>;

/**
 * Authentication configuration for Dockerode
 */
export interface DockerAuthConfig {
  username: string;
  password: string;
  serveraddress: string;
}

export interface CredentialLookupOptions {
  /** Defaults to ~/.docker/config.json */
  configPath?: string;
  /** Runs `docker-credential-<name> get`; replaceable in tests */
  runHelper?: CredentialHelperRunner;
}

export type CredentialHelperRunner = (
  helperName: string,
  serverUrl: string,
  logger: Logger,
) => Promise<Result<CredentialHelperResult>>;

export function defaultDockerConfigPath(): string {
  return join(homedir(), '.docker', 'config.json');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read and parse Docker configuration file
 */
export async function readDockerConfig(
  configPath: string,
  logger: Logger,
): Promise<Result<DockerConfig>> {
  try {
    const configContent = await readFile(configPath, 'utf-8');
    const parsed = dockerConfigSchema.safeParse(JSON.parse(configContent));
    if (!parsed.success) {
      return Failure(`Unexpected content in ${configPath}`, {
        message: 'Unable to read Docker configuration',
        hint: parsed.error.issues[0]?.message ?? 'Schema mismatch',
        resolution: `Check the format of ${configPath}`,
        code: ERROR_CODES.registry,
      });
    }

    logger.debug({ configPath, hasCredsStore: !!parsed.data.credsStore }, 'Read Docker config');
    return Success(parsed.data);
  } catch (error) {
    if (isMissingFile(error)) {
      logger.debug('Docker config file not found, using empty config');
      return Success({});
    }

    const errorMessage = extractErrorMessage(error);
    return Failure(`Failed to read Docker config: ${errorMessage}`, {
      message: 'Unable to read Docker configuration',
      hint: 'Docker config file is corrupted or inaccessible',
      resolution: `Check ${configPath} file permissions and format`,
      code: ERROR_CODES.registry,
      details: { error: errorMessage },
    });
  }
}

/**
 * Reduce a registry reference to the `host[:port]` key Docker uses in
 * config.json. Docker Hub aliases collapse to `docker.io`.
 */
export function normalizeRegistryHost(registry: string): string {
  const host = (registry.replace(/^https?:\/\//, '').split('/')[0] ?? registry).toLowerCase().trim();

  if (
    host === 'index.docker.io' ||
    host === 'registry-1.docker.io' ||
    host === 'registry.hub.docker.com'
  ) {
    return 'docker.io';
  }

  return host;
}

/**
 * Find the `auths` entry for a registry, accepting keys written with a scheme
 * or path as `docker login` sometimes does.
 */
function findAuthEntry(config: DockerConfig, registry: string) {
  const auths = config.auths ?? {};
  const direct = auths[registry];
  if (direct) return direct;
  const key = Object.keys(auths).find((candidate) => normalizeRegistryHost(candidate) === registry);
  return key === undefined ? undefined : auths[key];
}

/**
 * Validate that credential helper response matches expected registry
 *
 * SECURITY: Prevents credential leakage when a helper returns credentials
 * for a different host than requested.
 */
function validateCredentialHelperResponse(
  expectedRegistry: string,
  credentialResponse: CredentialHelperResult,
  logger: Logger,
): boolean {
  const received = normalizeRegistryHost(credentialResponse.ServerURL);

  if (received !== expectedRegistry) {
    logger.warn(
      { expected: expectedRegistry, received, serverUrl: credentialResponse.ServerURL },
      'SECURITY: Credential helper returned credentials for different host than requested',
    );
    return false;
  }

  return true;
}

/**
 * Execute a credential helper command
 */
export const executeCredentialHelper: CredentialHelperRunner = (helperName, serverUrl, logger) =>
  new Promise((resolve) => {
    const helperCommand = `docker-credential-${helperName}`;

    logger.debug({ helperCommand, serverUrl }, 'Executing credential helper');

    const child = spawn(helperCommand, ['get'], { timeout: 10000 });

    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (error) => {
      const notInstalled = 'code' in error && error.code === 'ENOENT';
      resolve(
        Failure(
          notInstalled ? `Credential helper not found: ${helperCommand}` : `Credential helper failed: ${error.message}`,
          {
            message: notInstalled
              ? 'Docker credential helper not installed'
              : 'Failed to retrieve credentials from helper',
            resolution: 'Install the credential helper or run docker login for the registry',
            code: ERROR_CODES.registry,
            details: { helperName, serverUrl },
          },
        ),
      );
    });

    child.on('close', (code) => {
      if (code !== 0) {
        const errorMessage = stderr || `Process exited with code ${code}`;
        const notLoggedIn =
          errorMessage.includes('credentials not found') || errorMessage.includes('not logged in');
        resolve(
          Failure(notLoggedIn ? 'No credentials found for registry' : `Credential helper failed: ${errorMessage}`, {
            message: notLoggedIn
              ? 'Registry credentials not found in credential store'
              : 'Failed to retrieve credentials from helper',
            resolution: `Run docker login ${serverUrl}`,
            code: ERROR_CODES.registry,
            details: { helperName, serverUrl },
          }),
        );
        return;
      }

      if (stderr) {
        logger.warn({ stderr, helperCommand }, 'Credential helper produced stderr output');
      }

      let data: unknown;
      try {
        data = JSON.parse(stdout);
      } catch (parseError) {
        resolve(
          Failure(`Failed to parse credential helper response: ${extractErrorMessage(parseError)}`, {
            message: 'Invalid JSON response from credential helper',
            resolution: 'Check credential helper configuration and try re-authenticating',
            code: ERROR_CODES.registry,
            details: { helperCommand, serverUrl },
          }),
        );
        return;
      }

      const parsed = credentialHelperResultSchema.safeParse(data);
      if (!parsed.success) {
        resolve(
          Failure('Invalid credential helper response', {
            message: 'Credential helper returned incomplete credentials',
            resolution: `Run docker login ${serverUrl}`,
            code: ERROR_CODES.registry,
            details: { helperCommand, serverUrl },
          }),
        );
        return;
      }

      logger.debug({ helperCommand, serverUrl }, 'Credential helper executed successfully');
      resolve(Success(parsed.data));
    });

    child.stdin.write(serverUrl);
    child.stdin.end();
  });

/**
 * Get credentials for a registry from the operator's Docker configuration.
 * `null` means the registry needs no credentials as far as Docker knows.
 */
export async function getRegistryCredentials(
  registry: string,
  logger: Logger,
  options: CredentialLookupOptions = {},
): Promise<Result<DockerAuthConfig | null>> {
  const configPath = options.configPath ?? defaultDockerConfigPath();
  const runHelper = options.runHelper ?? executeCredentialHelper;

  const configResult = await readDockerConfig(configPath, logger);
  if (!configResult.ok) {
    return configResult;
  }

  const config = configResult.value;
  const normalizedRegistry = normalizeRegistryHost(registry);

  logger.debug({ registry, normalizedRegistry }, 'Looking up credentials for registry');

  const auth = findAuthEntry(config, normalizedRegistry);
  if (auth) {
    if (auth.username && auth.password) {
      logger.debug({ registry: normalizedRegistry }, 'Using explicit credentials from config');
      return Success({
        username: auth.username,
        password: auth.password,
        serveraddress: normalizedRegistry,
      });
    }

    if (auth.auth) {
      const decoded = Buffer.from(auth.auth, 'base64').toString('utf-8');
      const separator = decoded.indexOf(':');
      if (separator > 0 && separator < decoded.length - 1) {
        logger.debug({ registry: normalizedRegistry }, 'Using base64 encoded credentials from config');
        return Success({
          username: decoded.slice(0, separator),
          password: decoded.slice(separator + 1),
          serveraddress: normalizedRegistry,
        });
      }
      logger.warn({ registry: normalizedRegistry }, 'Ignoring malformed auth entry in Docker config');
    }
  }

  const helpers = [config.credHelpers?.[normalizedRegistry], config.credsStore].filter(
    (helper): helper is string => helper !== undefined && helper !== '',
  );

  for (const helperName of helpers) {
    const credResult = await runHelper(helperName, normalizedRegistry, logger);
    if (!credResult.ok) {
      logger.debug({ helperName, error: credResult.error }, 'Credential helper failed');
      continue;
    }
    if (!validateCredentialHelperResponse(normalizedRegistry, credResult.value, logger)) {
      continue;
    }
    return Success({
      username: credResult.value.Username,
      password: credResult.value.Secret,
      serveraddress: normalizedRegistry,
    });
  }

  logger.debug({ registry: normalizedRegistry }, 'No credentials found for registry');
  return Success(null);
}

/**
 * Base64 of a `{"auths": {...}}` document holding one registry's credentials,
 * as consumed by a `kubernetes.io/dockerconfigjson` pull secret.
 */
export function buildRegistryConfigJson(credentials: DockerAuthConfig): string {
  const auth = Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64');
  const document = {
    auths: {
      [credentials.serveraddress]: {
        username: credentials.username,
        password: credentials.password,
        auth,
      },
    },
  };
  return Buffer.from(JSON.stringify(document)).toString('base64');
}
