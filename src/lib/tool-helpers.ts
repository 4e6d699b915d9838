/**
 * Helpers shared by workflow tools.
 */

import type { Logger } from 'pino';
import type { ToolContext } from '@/core/context';
import { createTimer, type Timer } from './logger';

/**
 * Scoped child logger for a tool.
 */
export function getToolLogger(ctx: ToolContext, toolName: string): Logger {
  return ctx.logger.child({ tool: toolName });
}

export function setupToolContext(
  ctx: ToolContext,
  toolName: string,
): { logger: Logger; timer: Timer } {
  const logger = getToolLogger(ctx, toolName);
  return { logger, timer: createTimer(logger, toolName) };
}

/**
 * Report progress when the caller asked for it.
 */
export async function reportProgress(
  ctx: ToolContext,
  message: string,
  progress?: number,
  total?: number,
): Promise<void> {
  if (ctx.progress) {
    await ctx.progress(message, progress, total);
  }
}
