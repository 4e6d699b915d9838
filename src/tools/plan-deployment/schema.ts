import { z } from 'zod';
import {
  cid,
  component,
  componentSettings,
  deploymentAction,
  imageLocation,
  namespace,
  region,
} from '../shared/schemas';

export const planDeploymentSchema = z.object({
  action: deploymentAction,
  component,
  namespace,
  cid: cid.optional().describe('Customer ID with checksum (install and upgrade)'),
  settings: componentSettings.optional().describe('Component answers (install and upgrade)'),
  clientId: z.string().min(1).optional().describe('API client id written into image analyzer values'),
  clientSecret: z.string().min(1).optional().describe('API client secret written into image analyzer values'),
  region: region.optional(),
  image: imageLocation.optional().describe('Mirrored image in the local registry (install and upgrade)'),
  registryConfigJSON: z.string().optional().describe('Base64 pull-secret blob'),
  valuesFile: z.string().min(1).describe('Where to write the rendered Helm values'),
  removeNamespace: z
    .boolean()
    .optional()
    .default(false)
    .describe('Include namespace deletion in an uninstall plan'),
});

export type PlanDeploymentParams = z.infer<typeof planDeploymentSchema>;
