import { z } from 'zod';
import type { Logger } from '../util/logging.js';
import { silentLogger } from '../util/logging.js';
import {
  DuplicateToolError,
  SchemaValidationError,
  UnknownToolError,
  type FieldIssue,
} from './errors.js';
import type { ToolArgs, ToolCall, ToolDispatcher, ToolResult, ToolSpec } from './types.js';

class ValidatedCall implements ToolCall {
  private readonly issuedBy = 'ToolRegistry';

  constructor(
    readonly tool: string,
    readonly args: ToolArgs,
    readonly spec: ToolSpec,
  ) {}
}

/** Only {@link ToolRegistry.dispatch} can build one of these. */
export type ValidatedToolCall = ValidatedCall;

interface Entry {
  spec: ToolSpec;
  strictArgs: z.ZodObject<z.ZodRawShape, 'strict'>;
}

function toFieldIssues(error: z.ZodError): FieldIssue[] {
  const issues: FieldIssue[] = [];
  for (const issue of error.issues) {
    if (issue.code === 'unrecognized_keys') {
      for (const key of issue.keys) issues.push({ field: key, reason: 'unexpected field' });
      continue;
    }
    const field = issue.path.length > 0 ? issue.path.map(String).join('.') : '(arguments)';
    const missing = issue.code === 'invalid_type' && issue.received === 'undefined';
    issues.push({ field, reason: missing ? 'required' : issue.message });
  }
  return issues;
}

function typeLabel(schema: z.ZodTypeAny): string {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) return typeLabel(schema.unwrap());
  if (schema instanceof z.ZodDefault) return typeLabel(schema.removeDefault());
  if (schema instanceof z.ZodEffects) return typeLabel(schema.innerType());
  if (schema instanceof z.ZodEnum) return schema.options.join(' | ');
  if (schema instanceof z.ZodNumber) return 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodString) return 'string';
  return 'value';
}

export class ToolRegistry {
  private readonly tools = new Map<string, Entry>();
  private readonly log: Logger;

  constructor(
    private readonly dispatcher: ToolDispatcher,
    opts: { log?: Logger } = {},
  ) {
    this.log = opts.log ?? silentLogger();
  }

  register(spec: ToolSpec): void {
    if (this.tools.has(spec.name)) throw new DuplicateToolError(spec.name);
    this.tools.set(spec.name, { spec: Object.freeze({ ...spec }), strictArgs: spec.args.strict() });
  }

  get(name: string): ToolSpec {
    return this.entry(name).spec;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolSpec[] {
    return Array.from(this.tools.values(), (e) => e.spec);
  }

  fieldNames(name: string): string[] {
    return Object.keys(this.entry(name).spec.args.shape);
  }

  /**
   * Returns normalized, coerced arguments or throws a SchemaValidationError
   * listing every violated field.
   */
  validate(name: string, args: ToolArgs): ToolArgs {
    const { strictArgs } = this.entry(name);
    const parsed = strictArgs.safeParse(args);
    if (!parsed.success) {
      throw new SchemaValidationError(name, toFieldIssues(parsed.error));
    }
    return parsed.data;
  }

  /**
   * The only way to reach the backend. Arguments are validated again here even
   * when the caller already did it.
   */
  async dispatch(name: string, args: ToolArgs): Promise<ToolResult> {
    const { spec } = this.entry(name);
    let normalized: ToolArgs;
    try {
      normalized = this.validate(name, args);
    } catch (error) {
      if (error instanceof SchemaValidationError) {
        this.log.warn({ tool: name, issues: error.issues }, 'tool call rejected by schema');
        return {
          success: false,
          tool: name,
          error: { kind: 'invalid_arguments', message: error.message, issues: error.issues },
        };
      }
      throw error;
    }
    this.log.debug({ tool: name, effect: spec.effect }, 'dispatching tool call');
    return this.dispatcher.call(new ValidatedCall(name, normalized, spec));
  }

  /** Renders the argument schema as a field list for prompts. */
  describe(name: string): string {
    const { spec } = this.entry(name);
    const lines = Object.entries(spec.args.shape).map(([field, schema]) => {
      const required = schema.isOptional() ? 'optional' : 'required';
      const hint = schema.description ? `: ${schema.description}` : '';
      return `- ${field} (${typeLabel(schema)}, ${required})${hint}`;
    });
    return [`${spec.name}: ${spec.description}`, ...lines].join('\n');
  }

  private entry(name: string): Entry {
    const entry = this.tools.get(name);
    if (!entry) throw new UnknownToolError(name);
    return entry;
  }
}
