import type { z } from 'zod';
import type { Result } from './core';
import type { ToolContext } from '@/core/context';
import type { ToolName } from '@/tools';

/**
 * Chain hints for workflow guidance
 */
export interface ChainHints {
  /** Guidance message shown after successful execution */
  success: string;
  /** Guidance message shown after failed execution */
  failure: string;
}

/**
 * Workflow step interface shared by every tool
 */
export interface Tool<TSchema extends z.ZodTypeAny = z.ZodTypeAny, TOut = unknown> {
  /** Unique tool identifier - must be a valid ToolName */
  name: ToolName;

  /** Human-readable description */
  description: string;

  /** Zod schema for validation */
  schema: TSchema;

  /** Optional workflow guidance hints for tool chaining */
  chainHints?: ChainHints;

  /** Parse and validate untyped arguments to strongly-typed input (matches Zod API) */
  parse: (args: unknown) => z.infer<TSchema>;

  /** Tool handler with pre-validated, strongly-typed input */
  handler: (input: z.infer<TSchema>, context: ToolContext) => Promise<Result<TOut>>;
}

/**
 * Lightweight helper to create tools with reduced boilerplate
 */
export function tool<TSchema extends z.ZodTypeAny, TOut>(config: {
  name: ToolName;
  description: string;
  schema: TSchema;
  handler: (input: z.infer<TSchema>, context: ToolContext) => Promise<Result<TOut>>;
  chainHints?: ChainHints;
}): Tool<TSchema, TOut> {
  return {
    ...config,
    parse: (args: unknown) => config.schema.parse(args), // Uses Zod's parse, throws on invalid
  };
}
