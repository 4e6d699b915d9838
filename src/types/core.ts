/**
 * Result type and error guidance shared by every module.
 *
 * Operations that can fail return `Result<T>` instead of throwing, so the
 * orchestrator decides how each failure class ends the run.
 */

/**
 * Terminal error classes surfaced to the operator.
 *
 * `ConfigCorrupt` is the only class the orchestrator recovers from.
 */
export const ERROR_CODES = {
  userInput: 'UserInputError',
  dependencyMissing: 'DependencyMissing',
  connectivity: 'ConnectivityError',
  auth: 'AuthError',
  registry: 'RegistryError',
  clusterQuery: 'ClusterQueryError',
  configCorrupt: 'ConfigCorrupt',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Structured guidance attached to a failure.
 */
export interface ErrorGuidance {
  /** Human-readable description of what failed */
  message: string;
  /** Likely cause */
  hint?: string;
  /** What the operator should do next */
  resolution?: string;
  /** Exact command the operator can rerun manually */
  command?: string;
  /** Error class for exit handling */
  code?: ErrorCode;
  /** Additional structured context for logs */
  details?: Record<string, unknown>;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

export type FailureResult = Extract<Result<never>, { ok: false }>;

export function Success<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function Failure<T = never>(error: string, guidance?: ErrorGuidance): Result<T> {
  if (guidance === undefined) {
    return { ok: false, error };
  }
  return { ok: false, error, guidance };
}

/**
 * Error code carried by a failed result, if any.
 */
export function failureCode(result: Result<unknown>): ErrorCode | undefined {
  return result.ok ? undefined : result.guidance?.code;
}
