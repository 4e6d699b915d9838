/**
 * Shared Runtime Logging - Harmonized Startup/Interrupt/Tool Logging
 *
 * Structured records go to the pino logger; the short human status lines go
 * to stderr so stdout carries only the command plan.
 */

import type { Logger } from 'pino';

/**
 * Runtime startup information
 */
export interface StartupInfo {
  /** Application name */
  appName: string;
  /** Application version */
  version: string;
  /** Directory holding saved answers and the values file */
  configDir: string;
  /** Log level */
  logLevel: string;
  /** Requested action */
  action: string;
  interactive: boolean;
}

/**
 * Log startup messages in a consistent format
 */
export function logStartup(info: StartupInfo, logger: Logger, quiet = false): void {
  logger.info(
    {
      version: info.version,
      config: {
        logLevel: info.logLevel,
        configDir: info.configDir,
        interactive: info.interactive,
      },
      action: info.action,
    },
    `Starting ${info.appName}`,
  );

  if (!quiet) {
    console.error(`🚀 ${info.appName} ${info.version}`);
    console.error(`📁 Config: ${info.configDir}`);
  }
}

/**
 * Log a run that ended in a terminal error
 */
export function logRunFailure(error: string, logger: Logger, context?: Record<string, unknown>): void {
  logger.error(context ? { ...context, error } : { error }, 'Run failed');
}

/**
 * Install the interrupt handler. The first SIGINT aborts `controller` so
 * in-flight work stops at the next step boundary; a second one exits
 * immediately with `exitCode`.
 *
 * @returns a function that removes the handler
 */
export function installInterruptHandler(
  controller: AbortController,
  logger: Logger,
  exitCode: number,
  quiet = false,
): () => void {
  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      logger.warn({ signal }, 'Second interrupt, exiting');
      process.exit(exitCode);
    }
    logger.info({ signal }, 'Interrupt received');
    if (!quiet) {
      console.error(`\n🛑 Received ${signal}, stopping before the next step...`);
    }
    controller.abort();
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}

/**
 * Standard log message format constants for tool execution
 * Ensures all tools use consistent "starting"/"completed" phrasing
 */
export const LOG_FORMAT = {
  /** Tool execution started */
  STARTING: 'starting',
  /** Tool execution completed successfully */
  COMPLETED: 'completed',
  /** Tool execution failed */
  FAILED: 'failed',
} as const;

/**
 * Log tool execution start with consistent format
 *
 * @example
 * ```typescript
 * logToolStart('mirror-image', { region: 'eu-1', imageTag: 'latest' }, logger);
 * // Logs: "Starting mirror-image" with structured params
 * ```
 */
export function logToolStart(
  toolName: string,
  params: Record<string, unknown>,
  logger: Logger,
): void {
  logger.info({ ...params, phase: LOG_FORMAT.STARTING }, `Starting ${toolName}`);
}

/**
 * Log tool execution completion with consistent format
 */
export function logToolComplete(
  toolName: string,
  result: Record<string, unknown>,
  logger: Logger,
  durationMs?: number,
): void {
  const logData = durationMs !== undefined ? { ...result, durationMs } : result;
  logger.info({ ...logData, phase: LOG_FORMAT.COMPLETED }, `Completed ${toolName}`);
}

/**
 * Log tool execution failure with consistent format
 *
 * @example
 * ```typescript
 * logToolFailure('check-connectivity', 'ts01-b.cloudsink.net unreachable', logger, { region: 'us-1' });
 * // Logs: "Failed check-connectivity" with error and context
 * ```
 */
export function logToolFailure(
  toolName: string,
  error: string | Error,
  logger: Logger,
  context?: Record<string, unknown>,
): void {
  const errorMessage = typeof error === 'string' ? error : error.message;
  const logData = context ? { ...context, error: errorMessage } : { error: errorMessage };
  logger.error({ ...logData, phase: LOG_FORMAT.FAILED }, `Failed ${toolName}`);
}
