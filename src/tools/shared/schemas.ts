/**
 * Shared Zod schemas for tool parameters
 * Common building blocks to reduce duplication across tools
 */

import { z } from 'zod';
import { falconComponentSchema } from '@/config/components';
import { cloudRegionIdSchema } from '@/config/regions';
import { CONTAINER_RUNTIMES, DEPLOYMENT_ACTIONS, IAR_MODES, SENSOR_BACKENDS } from '@/types';
import { cidIssue, imageTagIssue, namespaceIssue, registryIssue, requiredIssue } from '@/lib/validation';

/**
 * Adapt a `*Issue` validator to a zod refinement.
 */
function checkedBy(issue: (value: string) => string | undefined) {
  return (value: string, ctx: z.RefinementCtx): void => {
    const message = issue(value);
    if (message !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    }
  };
}

/**
 * Non-blank free text, trimmed.
 */
export const requiredText = (label: string) => z.string().trim().superRefine(checkedBy(requiredIssue(label)));

export const cid = z
  .string()
  .trim()
  .transform((value) => value.toUpperCase())
  .superRefine(checkedBy(cidIssue))
  .describe('Customer ID with checksum');

export const region = cloudRegionIdSchema;

export const namespace = z
  .string()
  .trim()
  .superRefine(checkedBy(namespaceIssue))
  .describe('Kubernetes namespace');

export const imageTag = z
  .string()
  .trim()
  .superRefine(checkedBy(imageTagIssue))
  .describe('Sensor image tag or "latest"');

export const localRegistry = z
  .string()
  .trim()
  .transform((value) => value.replace(/\/+$/, ''))
  .superRefine(checkedBy(registryIssue))
  .describe('Registry the cluster pulls from (host[:port][/path])');

export const backend = z.enum(SENSOR_BACKENDS).describe('Sensor backend');

export const component = falconComponentSchema;

export const clusterName = requiredText('Cluster name').describe('Kubernetes cluster name reported to the console');

export const iarMode = z.enum(IAR_MODES).describe('Image analyzer deployment mode');

export const iarRuntime = z.enum(CONTAINER_RUNTIMES).describe('Node container runtime (socket mode)');

export const componentSettings = z.discriminatedUnion('component', [
  z.object({ component: z.literal('sensor'), backend }),
  z.object({ component: z.literal('kac'), clusterName }),
  z.object({ component: z.literal('iar'), clusterName, iarMode, iarRuntime: iarRuntime.optional() }),
]);

export const deploymentAction = z.enum(DEPLOYMENT_ACTIONS).describe('Requested action');

export const imageLocation = z.object({
  repository: z.string().min(1),
  tag: z.string().min(1),
});
