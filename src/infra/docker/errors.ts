/**
 * Docker error classification
 *
 * Maps dockerode and daemon errors onto operator guidance. All image
 * transfer failures are registry errors; an unreachable daemon is a missing
 * dependency.
 */

import { ERROR_CODES, type ErrorGuidance } from '@/types/core';
import { extractErrorMessage } from '@/lib/errors';

interface DockerodeErrorShape {
  statusCode?: unknown;
  code?: unknown;
  json?: unknown;
  reason?: unknown;
}

function errorShape(error: unknown): DockerodeErrorShape {
  return typeof error === 'object' && error !== null ? error : {};
}

export function extractDockerErrorGuidance(error: unknown): ErrorGuidance {
  const shape = errorShape(error);
  const message = extractErrorMessage(error);
  const lower = message.toLowerCase();
  const details: Record<string, unknown> = {};
  if (typeof shape.statusCode === 'number') details.statusCode = shape.statusCode;
  if (typeof shape.code === 'string') details.code = shape.code;

  if (
    shape.code === 'ENOENT' ||
    shape.code === 'ECONNREFUSED' ||
    lower.includes('connect enoent') ||
    lower.includes('cannot connect to the docker daemon')
  ) {
    return {
      message: 'Docker daemon is not reachable',
      hint: message,
      resolution: 'Start Docker and make sure the current user can access its socket',
      code: ERROR_CODES.dependencyMissing,
      details,
    };
  }

  if (
    shape.statusCode === 401 ||
    lower.includes('unauthorized') ||
    lower.includes('authentication required') ||
    lower.includes('denied')
  ) {
    return {
      message: 'Registry rejected the credentials',
      hint: message,
      resolution: 'Check the API client has the Falcon Images Download scope, or log in to the local registry',
      code: ERROR_CODES.registry,
      details,
    };
  }

  if (shape.statusCode === 404 || lower.includes('not found') || lower.includes('manifest unknown')) {
    return {
      message: 'Image or tag was not found',
      hint: message,
      resolution: 'Check the image tag exists for this cloud region',
      code: ERROR_CODES.registry,
      details,
    };
  }

  if (lower.includes('http response to https client') || lower.includes('server gave http response')) {
    return {
      message: 'Local registry is served over plain HTTP',
      hint: message,
      resolution: 'Add the registry to "insecure-registries" in the Docker daemon configuration',
      code: ERROR_CODES.registry,
      details,
    };
  }

  return {
    message,
    resolution: 'Check Docker daemon logs and registry reachability',
    code: ERROR_CODES.registry,
    details,
  };
}
