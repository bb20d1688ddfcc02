import { z } from 'zod';
import { logger, withSpan } from '@taskchat/shared';
import type { ToolDefinition } from '@taskchat/shared';
import type { RegisteredTool, ToolOutput } from './types.js';

const log = logger.child({ module: 'tool-registry' });

export class ToolRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolRegistryError';
  }
}

/**
 * Pair an advertised definition with a zod validator and a typed handler.
 * Unknown argument keys are rejected.
 */
export function defineTool<Shape extends z.ZodRawShape>(tool: {
  definition: ToolDefinition;
  parameters: Shape;
  handler: (input: z.output<z.ZodObject<Shape, 'strict'>>) => ToolOutput | Promise<ToolOutput>;
}): RegisteredTool {
  const schema = z.object(tool.parameters).strict();
  return {
    definition: tool.definition,
    parameters: tool.parameters,
    invoke: async (input) => tool.handler(schema.parse(input)),
  };
}

/** Render a dispatch failure as the text handed back to the model */
export function describeToolError(err: unknown): string {
  if (err instanceof z.ZodError) {
    return err.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}

function checkAgainstSchema(key: string, tool: RegisteredTool): void {
  const { definition, parameters } = tool;
  if (definition.name !== key) {
    throw new ToolRegistryError(`tool '${key}' advertises the name '${definition.name}'`);
  }

  const advertised = Object.keys(definition.input_schema.properties);
  const validated = Object.keys(parameters);

  for (const name of advertised) {
    if (!(name in parameters)) {
      throw new ToolRegistryError(`tool '${key}' advertises parameter '${name}' but does not validate it`);
    }
  }
  for (const name of validated) {
    if (!advertised.includes(name)) {
      throw new ToolRegistryError(`tool '${key}' validates parameter '${name}' but does not advertise it`);
    }
  }
  for (const name of definition.input_schema.required ?? []) {
    const validator = parameters[name];
    if (!validator) {
      throw new ToolRegistryError(`tool '${key}' requires unknown parameter '${name}'`);
    }
    if (validator.isOptional()) {
      throw new ToolRegistryError(`tool '${key}' requires parameter '${name}' but validates it as optional`);
    }
  }
}

/**
 * Dispatch table over a closed set of tool names.
 *
 * The table is checked against each tool's advertised schema when the
 * registry is built, so a mismatch fails at startup. `execute` never
 * rejects: unknown names, invalid arguments and handler faults all come
 * back as result text for the model to react to.
 */
export class ToolRegistry<Name extends string = string> {
  private readonly tools: Record<Name, RegisteredTool>;
  private readonly order: Name[];

  constructor(tools: Record<Name, RegisteredTool>) {
    this.tools = tools;
    this.order = [];
    for (const [key, tool] of Object.entries<RegisteredTool>(tools)) {
      checkAgainstSchema(key, tool);
      if (this.has(key)) this.order.push(key);
    }
    log.info({ tools: this.order }, 'tool registry built');
  }

  has(name: string): name is Name {
    return Object.hasOwn(this.tools, name);
  }

  names(): Name[] {
    return [...this.order];
  }

  /** Advertised schema, in registration order */
  definitions(): ToolDefinition[] {
    return this.order.map((name) => this.tools[name].definition);
  }

  async execute(name: string, args: Record<string, unknown>): Promise<string> {
    if (!this.has(name)) {
      log.warn({ tool: name }, 'model requested unknown tool');
      return `Unknown tool: ${name}`;
    }

    const tool = this.tools[name];
    try {
      const output = await withSpan('tool.execute', { tool: name }, () => tool.invoke(args));
      log.info({ tool: name, args }, 'tool executed');
      return String(output);
    } catch (err) {
      log.warn({ err, tool: name, args }, 'tool execution failed');
      return `Error executing ${name}: ${describeToolError(err)}`;
    }
  }
}
