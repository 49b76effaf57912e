/**
 * Declare a tool's parameter schema next to its implementation.
 *
 * Arguments are validated against the declared schema (converted to zod)
 * before the implementation runs.
 */

import {
  ConfigError,
  ToolExecutionFailedError,
  ToolInputSchemaSchema,
  formatZodIssues,
  type JsonObject,
  type JsonValue,
  type ToolInputSchema,
} from '@turnkit/agent-contracts';
import type { Tool } from '@turnkit/agent-sdk';
import { jsonSchemaToZod } from '../schema-converter.js';

export interface FunctionToolOptions {
  name: string;
  description: string;
  parameters: ToolInputSchema;
  execute: (args: JsonObject) => Promise<JsonValue> | JsonValue;
  /** Overrides the run-level toolTimeoutMs */
  timeoutMs?: number;
}

export function defineTool(options: FunctionToolOptions): Tool {
  if (options.name.trim() === '') {
    throw new ConfigError('Tool name must not be empty');
  }
  const schemaCheck = ToolInputSchemaSchema.safeParse(options.parameters);
  if (!schemaCheck.success) {
    throw new ConfigError(`Invalid parameters schema for tool "${options.name}":\n${formatZodIssues(schemaCheck.error)}`);
  }

  const validator = jsonSchemaToZod(options.parameters);
  const { name, execute } = options;

  return Object.freeze({
    name,
    description: options.description,
    parametersSchema: options.parameters,
    timeoutMs: options.timeoutMs,
    async execute(args: JsonObject): Promise<JsonValue> {
      const check = validator.safeParse(args);
      if (!check.success) {
        throw new ToolExecutionFailedError(name, `Invalid arguments:\n${formatZodIssues(check.error)}`, check.error);
      }
      return execute(args);
    },
  });
}
