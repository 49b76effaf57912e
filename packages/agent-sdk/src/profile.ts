/**
 * AgentProfile: immutable identity of one agent for the duration of a turn.
 *
 * The runner holds exactly one "current" profile and replaces it wholesale
 * on handoff; profiles are never mutated in place (createAgent() freezes
 * them).
 */

import type { JsonObject, JsonValue, ToolInputSchema } from '@turnkit/agent-contracts';
import type { Tool } from './tool.js';
import type { AgentHooks } from './hooks.js';
import type {
  InputGuardrail,
  OutputGuardrail,
  ToolInputGuardrail,
  ToolOutputGuardrail,
} from './guardrail.js';

// ─────────────────────────────────────────────────────────────────────────────
// Handoff: pseudo-tool transferring control to another profile
// ─────────────────────────────────────────────────────────────────────────────

export interface Handoff {
  /** Catalog name, e.g. "transfer_to_billing_agent" */
  readonly toolName: string;
  readonly description: string;
  readonly parametersSchema: ToolInputSchema;

  /** Resolved on demand so two profiles may hand off to each other. */
  targetAgent(): AgentProfile;

  /**
   * Produces the handoff result. A result object carrying a string
   * `assistant` field is the marker that triggers the agent swap.
   */
  execute(args: JsonObject): Promise<JsonValue>;
}

// ─────────────────────────────────────────────────────────────────────────────
// AgentProfile
// ─────────────────────────────────────────────────────────────────────────────

export interface AgentProfile {
  readonly name: string;
  /** System message content; empty string means no system message */
  readonly instructions: string;
  /** Model id forwarded to the backend */
  readonly model: string;

  /** Ordered; resolved before handoffs */
  readonly tools: ReadonlyArray<Tool>;
  readonly handoffs: ReadonlyArray<Handoff>;
  readonly hooks: ReadonlyArray<AgentHooks>;

  readonly inputGuardrails: ReadonlyArray<InputGuardrail>;
  readonly outputGuardrails: ReadonlyArray<OutputGuardrail>;
  readonly toolInputGuardrails: ReadonlyArray<ToolInputGuardrail>;
  readonly toolOutputGuardrails: ReadonlyArray<ToolOutputGuardrail>;

  /** JSON Schema of the structured final output, sent with strict=true */
  readonly outputSchema?: Record<string, unknown>;
  /** Schema name in the response format; defaults to "output" */
  readonly outputName?: string;

  /**
   * Forwarded to the backend. Tool calls of one response are still
   * dispatched sequentially, in request order.
   */
  readonly parallelToolCalls: boolean;
}
