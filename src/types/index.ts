/**
 * Core type definitions for the deployment preparation workflow.
 * Provides the Result type for error handling and the shared domain model.
 */

export * from './core';
export * from './deployment';

/**
 * Tool execution context
 *
 * @remarks
 * ToolContext carries the structured logger, an optional AbortSignal for
 * operator interrupts, and an optional progress callback.
 *
 * @public
 */
export type { ToolContext } from '../core/context';
