/**
 * GuardrailPipeline: runs an agent's guardrails in order.
 *
 *   input      → [reject = InputGuardrailTriggeredError]
 *   tool args  → [reject = ToolInputGuardrailTriggeredError] → execute()
 *   tool out   → [reject = ToolOutputGuardrailTriggeredError]
 *   final text → [reject = OutputGuardrailTriggeredError]
 *
 * Sanitize actions are chained (each guardrail sees the previous sanitized
 * value). First rejection wins. Each method returns the value to use.
 */

import {
  InputGuardrailTriggeredError,
  OutputGuardrailTriggeredError,
  ToolInputGuardrailTriggeredError,
  ToolOutputGuardrailTriggeredError,
  type JsonObject,
  type JsonValue,
} from '@turnkit/agent-contracts';
import type { AgentProfile, ValidationResult } from '@turnkit/agent-sdk';
import type { Logger } from '../logging/logger.js';

type Check<T> = {
  name: string;
  run: (value: T) => ValidationResult<T> | Promise<ValidationResult<T>>;
};

async function runChecks<T>(
  value: T,
  checks: ReadonlyArray<Check<T>>,
  reject: (reason: string) => Error,
  logger: Logger,
): Promise<T> {
  let current = value;
  for (const check of checks) {
    const result = await check.run(current);
    if (result.ok) {
      continue;
    }
    if (result.action === 'reject') {
      throw reject(result.reason);
    }
    logger.debug({ guardrail: check.name, reason: result.reason }, 'Guardrail sanitized value');
    current = result.sanitized;
  }
  return current;
}

export class GuardrailPipeline {
  constructor(private readonly logger: Logger) {}

  checkInput(agent: AgentProfile, input: string): Promise<string> {
    return runChecks(
      input,
      agent.inputGuardrails.map((g) => ({ name: g.name, run: (value: string) => g.check(value, agent) })),
      (reason) => new InputGuardrailTriggeredError(reason),
      this.logger,
    );
  }

  checkOutput(agent: AgentProfile, output: string): Promise<string> {
    return runChecks(
      output,
      agent.outputGuardrails.map((g) => ({ name: g.name, run: (value: string) => g.check(value, agent) })),
      (reason) => new OutputGuardrailTriggeredError(reason),
      this.logger,
    );
  }

  checkToolInput(agent: AgentProfile, toolName: string, args: JsonObject): Promise<JsonObject> {
    return runChecks(
      args,
      agent.toolInputGuardrails.map((g) => ({
        name: g.name,
        run: (value: JsonObject) => g.check(toolName, value, agent),
      })),
      (reason) => new ToolInputGuardrailTriggeredError(toolName, reason),
      this.logger,
    );
  }

  checkToolOutput(agent: AgentProfile, toolName: string, output: JsonValue): Promise<JsonValue> {
    return runChecks(
      output,
      agent.toolOutputGuardrails.map((g) => ({
        name: g.name,
        run: (value: JsonValue) => g.check(toolName, value, agent),
      })),
      (reason) => new ToolOutputGuardrailTriggeredError(toolName, reason),
      this.logger,
    );
  }
}
