import { z } from 'zod';
import { region } from '../shared/schemas';

export const checkConnectivitySchema = z.object({
  region,
  probeTimeoutMs: z.number().int().positive().optional().describe('Per-domain probe timeout'),
  overallTimeoutMs: z.number().int().positive().optional().describe('Deadline for the whole preflight'),
  concurrency: z.number().int().positive().optional().describe('Maximum concurrent probes'),
});

export type CheckConnectivityParams = z.infer<typeof checkConnectivitySchema>;
