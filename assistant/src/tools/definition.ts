import type { ZodType, ZodTypeDef } from 'zod';

/**
 * JSON-schema-like description of accepted arguments.
 * Presentational only: the engine never validates calls against it.
 */
export type ParameterSchema = Record<string, unknown>;

export type ToolHandler = (args: Record<string, unknown>) => unknown;

/**
 * A named capability the model can call.
 */
export type ToolDescriptor = {
  readonly name: string;
  readonly description: string;
  readonly parameterSchema: ParameterSchema;
  readonly handler: ToolHandler;
};

/**
 * Definition for a tool whose arguments are parsed with a zod schema before execution.
 */
export type ToolDefinition<Args, Result> = {
  name: string;
  description: string;
  parameterSchema: ParameterSchema;
  argsSchema: ZodType<Args, ZodTypeDef, unknown>;
  execute(args: Args): Promise<Result> | Result;
};

/**
 * Builds an immutable descriptor whose handler parses arguments with `argsSchema`.
 * A parse failure throws, which the engine reports back to the model as a tool error.
 */
export const defineTool = <Args, Result>(definition: ToolDefinition<Args, Result>): ToolDescriptor => (
  Object.freeze({
    name: definition.name,
    description: definition.description,
    parameterSchema: definition.parameterSchema,
    handler: (args: Record<string, unknown>) => definition.execute(definition.argsSchema.parse(args)),
  })
);
