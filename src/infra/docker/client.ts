/**
 * Docker client for image mirroring
 *
 * Pull, tag and push through the Docker Engine API. Every operation returns a
 * Result; daemon and registry errors are classified by
 * `extractDockerErrorGuidance`.
 */

import Docker, { type DockerOptions } from 'dockerode';
import type { Logger } from 'pino';
import { Success, Failure, type Result } from '@/types';
import { extractErrorMessage } from '@/lib/errors';
import { extractDockerErrorGuidance } from './errors';
import type { DockerAuthConfig } from './credential-helpers';

/**
 * Docker client configuration options.
 */
export interface DockerClientConfig {
  /** Docker socket path; dockerode falls back to DOCKER_HOST or the default socket */
  socketPath?: string;
  /** Connection timeout in milliseconds */
  timeout?: number;
}

/**
 * Result of pushing a Docker image to a registry.
 */
export interface DockerPushResult {
  /** Content-addressable digest reported by the registry, empty when none was reported */
  digest: string;
  size?: number;
}

/**
 * Docker client interface for mirroring operations.
 */
export interface DockerClient {
  /** Confirm the daemon answers. */
  ping: () => Promise<Result<void>>;

  /**
   * Pull `repository:tag`, authenticating with `authConfig` when given.
   */
  pullImage: (repository: string, tag: string, authConfig?: DockerAuthConfig) => Promise<Result<void>>;

  /**
   * Tags a Docker image with a new repository and tag.
   * @param imageRef - Existing image reference (`repository:tag` or ID)
   */
  tagImage: (imageRef: string, repository: string, tag: string) => Promise<Result<void>>;

  /**
   * Pushes a Docker image to a registry.
   * @param authConfig - Optional authentication configuration for registry
   */
  pushImage: (
    repository: string,
    tag: string,
    authConfig?: DockerAuthConfig,
  ) => Promise<Result<DockerPushResult>>;
}

interface DockerProgressEvent {
  status?: string;
  progressDetail?: Record<string, unknown>;
  error?: string;
  errorDetail?: { message?: string };
  aux?: {
    Digest?: string;
    Size?: number;
  };
}

function eventError(event: DockerProgressEvent): string | undefined {
  if (event.error) return event.error;
  if (event.errorDetail) return event.errorDetail.message ?? 'Unknown Docker error';
  return undefined;
}

/**
 * Create base Docker client implementation
 */
export function createBaseDockerClient(docker: Docker, logger: Logger): DockerClient {
  /**
   * Drain a progress stream. Resolves when the daemon closes it; rejects on
   * the first error event, since the daemon reports pull and push failures
   * in-band.
   */
  const followProgress = (
    stream: NodeJS.ReadableStream,
    operation: string,
    onEvent: (event: DockerProgressEvent) => void = () => undefined,
  ): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      let streamError: Error | null = null;

      docker.modem.followProgress(
        stream,
        (err: Error | null) => {
          if (err) {
            reject(err);
          } else if (streamError) {
            reject(streamError);
          } else {
            resolve();
          }
        },
        (event: DockerProgressEvent) => {
          logger.debug(event, `Docker ${operation} progress`);
          const message = eventError(event);
          if (message !== undefined && !streamError) {
            logger.error({ errorEvent: event }, `Docker ${operation} error event received`);
            streamError = new Error(message);
          }
          onEvent(event);
        },
      );
    });

  const fail = <T>(operation: string, error: unknown, context: Record<string, unknown>): Result<T> => {
    const guidance = extractDockerErrorGuidance(error);
    const errorMessage = `Failed to ${operation} image: ${guidance.message}`;

    logger.error(
      {
        error: errorMessage,
        hint: guidance.hint,
        resolution: guidance.resolution,
        errorDetails: guidance.details,
        ...context,
      },
      `Docker ${operation} image failed`,
    );

    return Failure(errorMessage, guidance);
  };

  return {
    async ping(): Promise<Result<void>> {
      try {
        await docker.ping();
        return Success(undefined);
      } catch (error) {
        const guidance = extractDockerErrorGuidance(error);
        logger.debug({ error: guidance.message }, 'Docker ping failed');
        return Failure(`Docker daemon is not reachable: ${extractErrorMessage(error)}`, guidance);
      }
    },

    async pullImage(repository: string, tag: string, authConfig?: DockerAuthConfig): Promise<Result<void>> {
      const reference = `${repository}:${tag}`;
      try {
        logger.debug({ reference }, 'Starting Docker pull');
        const stream: NodeJS.ReadableStream = await docker.pull(
          reference,
          authConfig ? { authconfig: authConfig } : {},
        );
        await followProgress(stream, 'pull');

        logger.info({ reference }, 'Image pulled successfully');
        return Success(undefined);
      } catch (error) {
        return fail('pull', error, { reference });
      }
    },

    async tagImage(imageRef: string, repository: string, tag: string): Promise<Result<void>> {
      try {
        const image = docker.getImage(imageRef);
        await image.tag({ repo: repository, tag });

        logger.info({ imageRef, repository, tag }, 'Image tagged successfully');
        return Success(undefined);
      } catch (error) {
        return fail('tag', error, { imageRef, repository, tag });
      }
    },

    async pushImage(
      repository: string,
      tag: string,
      authConfig?: DockerAuthConfig,
    ): Promise<Result<DockerPushResult>> {
      try {
        const image = docker.getImage(`${repository}:${tag}`);
        // An empty authconfig keeps dockerode from sending a malformed X-Registry-Auth header
        const stream = await image.push({ authconfig: authConfig ?? {} });

        let digest = '';
        let size: number | undefined;

        await followProgress(stream, 'push', (event) => {
          if (event.aux?.Digest) digest = event.aux.Digest;
          if (event.aux?.Size) size = event.aux.Size;
        });

        logger.info({ repository, tag, digest }, 'Image pushed successfully');
        const result: DockerPushResult = { digest };
        if (size !== undefined) {
          result.size = size;
        }
        return Success(result);
      } catch (error) {
        return fail('push', error, { repository, tag });
      }
    },
  };
}

/**
 * Create a Docker client connected to the local daemon
 */
export const createDockerClient = (logger: Logger, config: DockerClientConfig = {}): DockerClient => {
  const dockerOptions: DockerOptions = {};

  if (config.socketPath) {
    dockerOptions.socketPath = config.socketPath;
  }
  if (config.timeout) {
    dockerOptions.timeout = config.timeout;
  }

  const docker = new Docker(dockerOptions);

  logger.debug({ dockerOptions }, 'Created Docker client');

  return createBaseDockerClient(docker, logger);
};
