/**
 * Error helpers
 *
 * Shared messages and helpers for `ErrorGuidance`.
 */

import { ERROR_CODES, type ErrorGuidance } from '@/types/core';

export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * Attach a rerun command to guidance without mutating the original.
 */
export function withCommand(guidance: ErrorGuidance, command: string): ErrorGuidance {
  return { ...guidance, command };
}

export const ERROR_MESSAGES = {
  MISSING_SECRET: 'Client secret is required to proceed',
  CONFIG_UNREADABLE: 'Saved configuration could not be read',
  CLUSTER_STATE_UNKNOWN: 'Could not determine whether the sensor release is installed',
} as const;

export { ERROR_CODES };
