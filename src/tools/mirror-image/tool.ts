/**
 * Mirror Image Tool
 *
 * Copies a component image from the vendor registry into the operator's
 * registry: obtain vendor registry credentials, resolve the tag, pull, retag,
 * push, then build the pull-secret blob for the Helm values. Each step runs
 * once; a failure stops the mirror and names the step with the command to
 * rerun by hand. Every step is safe to repeat.
 */

import { setupToolContext, reportProgress } from '@/lib/tool-helpers';
import { COMPONENTS } from '@/config/components';
import { CLOUD_REGIONS } from '@/config/regions';
import { IMAGE } from '@/config/constants';
import { formatCommand } from '@/lib/command-runner';
import { withCommand } from '@/lib/errors';
import { buildRegistryConfigJson, type DockerAuthConfig } from '@/infra/docker/credential-helpers';
import {
  registryUsername,
  selectLatestTag,
  vendorImagePath,
  vendorImageRepository,
} from '@/infra/vendor/api-client';
import {
  Success,
  Failure,
  ERROR_CODES,
  formatImage,
  type ErrorCode,
  type ImageReference,
  type Result,
} from '@/types';
import type { ToolContext } from '@/core/context';
import { tool } from '@/types/tool';
import { MIRROR_STEPS, mirrorImageSchema, type MirrorImageParams, type MirrorStep } from './schema';

export interface MirrorImageResult {
  /**
   * Natural language summary for user display.
   * @example "✅ Mirrored falcon-sensor 7.18.0-17106 to localhost:5000/falcon-sensor:7.18.0-17106"
   */
  summary: string;
  image: ImageReference;
  /** Base64 docker config for the pull secret; empty when the local registry needs no credentials */
  registryConfigJSON: string;
  /** Digest reported by the local registry, empty when none was reported */
  digest: string;
  warnings: string[];
}

const PASSTHROUGH_CODES: ReadonlySet<ErrorCode> = new Set([ERROR_CODES.auth, ERROR_CODES.connectivity]);

/**
 * Wrap a step failure so it names the step and carries a manual command.
 * Auth and connectivity codes pass through; everything else is a registry error.
 */
function stepFailure<T>(step: MirrorStep, failed: Result<unknown>, command: string): Result<T> {
  if (failed.ok) {
    return Failure(`Image mirror failed at step "${step}"`);
  }
  const reported = failed.guidance?.code;
  const code = reported !== undefined && PASSTHROUGH_CODES.has(reported) ? reported : ERROR_CODES.registry;
  const guidance = failed.guidance ?? { message: failed.error };
  return Failure(`Image mirror failed at step "${step}": ${failed.error}`, {
    ...withCommand(guidance, failed.guidance?.command ?? command),
    code,
    details: { ...guidance.details, step },
  });
}

function interrupted<T>(step: MirrorStep): Result<T> {
  return Failure(`Image mirror interrupted before step "${step}"`, {
    message: 'Interrupted by operator',
    resolution: 'Rerun; every mirror step is safe to repeat',
  });
}

async function handleMirrorImage(
  input: MirrorImageParams,
  ctx: ToolContext,
): Promise<Result<MirrorImageResult>> {
  const { logger, timer } = setupToolContext(ctx, 'mirror-image');
  const { docker, localCredentials } = ctx.services;
  const region = CLOUD_REGIONS[input.region];
  const { imageName } = COMPONENTS[input.component];
  const { auth, vendorApi } = ctx.services.vendor({
    region,
    clientId: input.clientId,
    clientSecret: input.clientSecret,
  });
  const warnings: string[] = [];
  const total = MIRROR_STEPS.length;

  const begin = async (step: MirrorStep, message: string): Promise<boolean> => {
    if (ctx.signal?.aborted) return false;
    logger.debug({ step }, 'Mirror step starting');
    await reportProgress(ctx, message, MIRROR_STEPS.indexOf(step) + 1, total);
    return true;
  };

  // registry-login: vendor registry credentials, exchanged with the OAuth token
  const username = registryUsername(input.cid);
  const loginCommand = `docker login ${region.registryHost} -u ${username} --password-stdin`;
  if (!(await begin('registry-login', `Authenticating to ${region.registryHost}`))) {
    return interrupted('registry-login');
  }
  const token = await auth.getToken();
  if (!token.ok) {
    timer.error(token.error);
    return stepFailure('registry-login', token, loginCommand);
  }
  const vendorCredentials = await vendorApi.getRegistryCredentials(token.value.accessToken, input.cid);
  if (!vendorCredentials.ok) {
    timer.error(vendorCredentials.error);
    return stepFailure('registry-login', vendorCredentials, loginCommand);
  }

  // resolve-tag
  const repository = vendorImageRepository(region, imageName);
  let tag = input.imageTag;
  if (!(await begin('resolve-tag', `Resolving image tag "${tag}"`))) {
    return interrupted('resolve-tag');
  }
  if (tag === IMAGE.LATEST_KEYWORD) {
    const tagsCommand = `curl -sS -u ${username}:<registry-token> https://${region.registryHost}/v2/${vendorImagePath(region, imageName)}/tags/list`;
    const tags = await vendorApi.listImageTags(vendorCredentials.value, imageName);
    if (!tags.ok) {
      timer.error(tags.error);
      return stepFailure('resolve-tag', tags, tagsCommand);
    }
    const latest = selectLatestTag(tags.value);
    if (latest === undefined) {
      const error = `No versioned tags published for ${repository}`;
      timer.error(error);
      return stepFailure(
        'resolve-tag',
        Failure(error, {
          message: `Could not resolve "${IMAGE.LATEST_KEYWORD}" for ${imageName}`,
          resolution: 'Specify a concrete image tag',
        }),
        tagsCommand,
      );
    }
    logger.info({ tag: latest }, `Resolved "${IMAGE.LATEST_KEYWORD}" to a concrete tag`);
    tag = latest;
  }

  const image: ImageReference = {
    source: { repository, tag },
    target: { repository: `${input.localRegistry}/${imageName}`, tag },
  };
  const source = formatImage(image.source);
  const target = formatImage(image.target);

  // pull
  if (!(await begin('pull', `Pulling ${source}`))) {
    return interrupted('pull');
  }
  const pulled = await docker.pullImage(repository, tag, vendorCredentials.value);
  if (!pulled.ok) {
    timer.error(pulled.error);
    return stepFailure('pull', pulled, formatCommand(['docker', 'pull', source]));
  }

  // retag
  if (!(await begin('retag', `Tagging as ${target}`))) {
    return interrupted('retag');
  }
  const tagged = await docker.tagImage(source, image.target.repository, tag);
  if (!tagged.ok) {
    timer.error(tagged.error);
    return stepFailure('retag', tagged, formatCommand(['docker', 'tag', source, target]));
  }

  // push
  const pushCommand = formatCommand(['docker', 'push', target]);
  if (!(await begin('push', `Pushing to ${input.localRegistry}`))) {
    return interrupted('push');
  }
  const local = await localCredentials(input.localRegistry, logger);
  if (!local.ok) {
    timer.error(local.error);
    return stepFailure('push', local, pushCommand);
  }
  const localAuth: DockerAuthConfig | undefined = local.value ?? undefined;
  const pushed = await docker.pushImage(image.target.repository, tag, localAuth);
  if (!pushed.ok) {
    timer.error(pushed.error);
    return stepFailure('push', pushed, pushCommand);
  }

  // pull-secret
  if (!(await begin('pull-secret', 'Building pull secret'))) {
    return interrupted('pull-secret');
  }
  let registryConfigJSON = '';
  if (localAuth) {
    registryConfigJSON = buildRegistryConfigJson(localAuth);
  } else {
    warnings.push(
      `No authentication found for local registry ${input.localRegistry}. Manual pull secrets may be needed.`,
    );
  }

  timer.end({ source, target, digest: pushed.value.digest });
  return Success({
    summary: `✅ Mirrored ${source} to ${target}`,
    image,
    registryConfigJSON,
    digest: pushed.value.digest,
    warnings,
  });
}

export default tool({
  name: 'mirror-image',
  description: 'Copy a component image from the vendor registry into the local registry',
  schema: mirrorImageSchema,
  handler: handleMirrorImage,
  chainHints: {
    success: 'Image mirrored. Continue with deployment planning.',
    failure: 'Run the reported command by hand to diagnose, then rerun; every step is safe to repeat.',
  },
});
