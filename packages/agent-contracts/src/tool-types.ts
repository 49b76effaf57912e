/**
 * Tool System Types
 *
 * What the model sees (definitions), what it asks for (calls) and what the
 * runner feeds back (results).
 */

import type { JsonObject, JsonValue } from './json.js';

/**
 * JSON Schema for tool input
 *
 * This is the schema that LLM sees and uses to generate tool calls
 */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
  additionalProperties?: boolean;
  description?: string;
}

/**
 * Tool definition (what LLM sees)
 */
export interface ToolDefinition {
  /** Unique within the active catalog (e.g. "get_weather", "transfer_to_billing") */
  name: string;
  /** Human-readable description for LLM */
  description: string;
  /** JSON Schema for tool input */
  parameters: ToolInputSchema;
}

/**
 * Tool call from LLM, complete and addressable.
 */
export interface ToolCall {
  id: string;
  name: string;
  arguments: JsonObject;
}

/**
 * Tool execution result, rendered into a tool-role message for the next turn.
 */
export interface ToolResult {
  name: string;
  output: JsonValue;
}
