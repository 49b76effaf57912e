/**
 * Guardrails: checks around the run input, the final output and each tool
 * call.
 *
 *   input  → InputGuardrail      → [reject = InputGuardrailTriggeredError]
 *   tool   → ToolInputGuardrail  → execute() → ToolOutputGuardrail
 *   output → OutputGuardrail     → [reject = OutputGuardrailTriggeredError]
 *
 * 'sanitize' replaces the checked value; later guardrails see the sanitized
 * value. The first 'reject' wins.
 */

import type { JsonObject, JsonValue } from '@turnkit/agent-contracts';
import type { AgentProfile } from './profile.js';

// ─────────────────────────────────────────────────────────────────────────────
// ValidationResult: what a guardrail returns
// ─────────────────────────────────────────────────────────────────────────────

export type ValidationResult<T = string> =
  | { ok: true }
  | { ok: false; reason: string; action: 'reject' }
  | { ok: false; reason: string; action: 'sanitize'; sanitized: T };

// ─────────────────────────────────────────────────────────────────────────────
// Guardrail interfaces
// ─────────────────────────────────────────────────────────────────────────────

export interface InputGuardrail {
  name: string;
  check(input: string, agent: AgentProfile): ValidationResult | Promise<ValidationResult>;
}

export interface OutputGuardrail {
  name: string;
  check(output: string, agent: AgentProfile): ValidationResult | Promise<ValidationResult>;
}

export interface ToolInputGuardrail {
  name: string;
  check(
    toolName: string,
    args: JsonObject,
    agent: AgentProfile,
  ): ValidationResult<JsonObject> | Promise<ValidationResult<JsonObject>>;
}

export interface ToolOutputGuardrail {
  name: string;
  check(
    toolName: string,
    output: JsonValue,
    agent: AgentProfile,
  ): ValidationResult<JsonValue> | Promise<ValidationResult<JsonValue>>;
}
