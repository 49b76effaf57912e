/**
 * Build a validated, frozen AgentProfile.
 */

import {
  AgentOptionsSchema,
  ConfigError,
  errorMessage,
  formatZodIssues,
  type AgentOptionsInput,
} from '@turnkit/agent-contracts';
import type {
  AgentHooks,
  AgentProfile,
  Handoff,
  InputGuardrail,
  OutputGuardrail,
  Tool,
  ToolInputGuardrail,
  ToolOutputGuardrail,
} from '@turnkit/agent-sdk';
import { createHandoff, type AgentRef } from '../handoffs/handoff.js';
import { jsonSchemaToZod } from '../schema-converter.js';

export interface CreateAgentOptions extends AgentOptionsInput {
  tools?: Tool[];
  /** Handoff objects, or agents (direct or lazy) to wrap with createHandoff() */
  handoffs?: Array<Handoff | AgentRef>;
  hooks?: AgentHooks[];
  inputGuardrails?: InputGuardrail[];
  outputGuardrails?: OutputGuardrail[];
  toolInputGuardrails?: ToolInputGuardrail[];
  toolOutputGuardrails?: ToolOutputGuardrail[];
}

function toHandoff(entry: Handoff | AgentRef): Handoff {
  if (typeof entry === 'function') {
    return createHandoff(entry);
  }
  return 'toolName' in entry ? entry : createHandoff(entry);
}

/**
 * @throws ConfigError when a plain field is invalid or the output schema
 *   cannot be converted
 */
export function createAgent(options: CreateAgentOptions): AgentProfile {
  const parsed = AgentOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigError(`Invalid agent options:\n${formatZodIssues(parsed.error)}`, parsed.error);
  }
  const fields = parsed.data;

  if (fields.outputSchema) {
    try {
      jsonSchemaToZod(fields.outputSchema);
    } catch (error) {
      throw new ConfigError(`Invalid output schema for agent "${fields.name}": ${errorMessage(error)}`, error);
    }
  }

  return Object.freeze({
    name: fields.name,
    instructions: fields.instructions,
    model: fields.model,
    outputSchema: fields.outputSchema,
    outputName: fields.outputName,
    parallelToolCalls: fields.parallelToolCalls,
    tools: Object.freeze([...(options.tools ?? [])]),
    handoffs: Object.freeze((options.handoffs ?? []).map(toHandoff)),
    hooks: Object.freeze([...(options.hooks ?? [])]),
    inputGuardrails: Object.freeze([...(options.inputGuardrails ?? [])]),
    outputGuardrails: Object.freeze([...(options.outputGuardrails ?? [])]),
    toolInputGuardrails: Object.freeze([...(options.toolInputGuardrails ?? [])]),
    toolOutputGuardrails: Object.freeze([...(options.toolOutputGuardrails ?? [])]),
  });
}

/** Copy of `agent` with some fields replaced; the original is untouched */
export function cloneAgent(agent: AgentProfile, overrides: Partial<CreateAgentOptions>): AgentProfile {
  return createAgent({
    name: agent.name,
    instructions: agent.instructions,
    model: agent.model,
    outputSchema: agent.outputSchema,
    outputName: agent.outputName,
    parallelToolCalls: agent.parallelToolCalls,
    tools: [...agent.tools],
    handoffs: [...agent.handoffs],
    hooks: [...agent.hooks],
    inputGuardrails: [...agent.inputGuardrails],
    outputGuardrails: [...agent.outputGuardrails],
    toolInputGuardrails: [...agent.toolInputGuardrails],
    toolOutputGuardrails: [...agent.toolOutputGuardrails],
    ...overrides,
  });
}
