/**
 * Mirror image tool parameter validation schemas.
 */

import { z } from 'zod';
import { cid, component, imageTag, localRegistry, region } from '../shared/schemas';

export const mirrorImageSchema = z.object({
  component,
  cid,
  clientId: z.string().trim().min(1).describe('Vendor API client id'),
  clientSecret: z.string().min(1).describe('Vendor API client secret'),
  region,
  localRegistry,
  imageTag,
});

export type MirrorImageParams = z.infer<typeof mirrorImageSchema>;

export const MIRROR_STEPS = [
  'registry-login',
  'resolve-tag',
  'pull',
  'retag',
  'push',
  'pull-secret',
] as const;

export type MirrorStep = (typeof MIRROR_STEPS)[number];
