/**
 * Core Tool Context
 *
 * Provides the ToolContext interface and factory used by every workflow
 * tool. The context is the only channel through which tools receive logging,
 * collaborators, cancellation and progress reporting.
 */

import type { Logger } from 'pino';
import type { Services } from './services';

// ===== TYPES =====

/**
 * Progress reporting function for tool execution feedback.
 *
 * Tools call this to report progress during long-running operations such as
 * image pulls and pushes.
 *
 * @param message - Human-readable progress message
 * @param progress - Current progress value (optional)
 * @param total - Total progress value (optional)
 */
export type ProgressReporter = (
  message: string,
  progress?: number,
  total?: number,
) => Promise<void>;

/**
 * Core tool execution context.
 */
export interface ToolContext {
  /**
   * Optional abort signal, raised when the operator interrupts the run.
   * Tools check it between steps.
   */
  signal?: AbortSignal;

  /** Optional progress reporting function for user feedback. */
  progress?: ProgressReporter;

  /** Logger for debugging and error tracking. */
  logger: Logger;

  /** External collaborators (docker, helm, vendor API). */
  services: Services;
}

// ===== CONTEXT OPTIONS =====

export interface ContextOptions {
  signal?: AbortSignal;
  progress?: ProgressReporter;
}

// ===== CONTEXT FACTORY =====

/**
 * Create a ToolContext for tool execution.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'cli' });
 * const ctx = createToolContext(logger, services, {
 *   signal: abortController.signal,
 *   progress: async (msg) => console.error(msg),
 * });
 *
 * const result = await mirrorImageTool.handler(input, ctx);
 * ```
 */
export function createToolContext(
  logger: Logger,
  services: Services,
  options: ContextOptions = {},
): ToolContext {
  const { signal, progress } = options;

  const ctx: ToolContext = { logger, services };

  if (signal !== undefined) ctx.signal = signal;
  if (progress !== undefined) ctx.progress = progress;

  return ctx;
}
