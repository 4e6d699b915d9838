import { z } from 'zod';
import { deploymentAction } from '../shared/schemas';

export const checkPrerequisitesSchema = z.object({
  action: deploymentAction,
  checkCluster: z
    .boolean()
    .optional()
    .default(true)
    .describe('Confirm kubectl can reach the cluster (install and upgrade only)'),
});

export type CheckPrerequisitesParams = z.infer<typeof checkPrerequisitesSchema>;
