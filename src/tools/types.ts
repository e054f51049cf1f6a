import type { z } from 'zod';
import type { FieldIssue } from './errors.js';
import type { ValidatedToolCall } from './registry.js';

export type ToolArgs = Record<string, unknown>;

export type ToolArgsSchema = z.ZodObject<z.ZodRawShape>;

/** `read` tools are side-effect free and may be retried; `write` tools never are. */
export type ToolEffect = 'read' | 'write';

export interface ToolSpec {
  readonly name: string;
  readonly description: string;
  readonly effect: ToolEffect;
  readonly args: ToolArgsSchema;
  readonly result: z.ZodTypeAny;
}

export interface ToolCall {
  tool: string;
  args: ToolArgs;
}

export type FailureKind = 'ambiguous' | 'declined' | 'unavailable' | 'invalid_arguments';

export interface ToolError {
  kind: FailureKind;
  message: string;
  status?: number;
  issues?: FieldIssue[];
}

export type ToolResult<T = unknown> =
  | { success: true; tool: string; data: T }
  | { success: false; tool: string; error: ToolError };

export interface ToolDispatcher {
  call(call: ValidatedToolCall): Promise<ToolResult>;
}

export type { ValidatedToolCall };
