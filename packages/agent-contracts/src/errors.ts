/**
 * Agent Error Taxonomy
 *
 * Every failure the runner surfaces is an AgentError subclass with a stable
 * `code`. `retriable` marks the failures a caller may reasonably retry
 * (backend and session I/O); the runner itself never retries.
 */

export type AgentErrorCode =
  | 'MAX_TURNS_EXCEEDED'
  | 'INPUT_GUARDRAIL_TRIGGERED'
  | 'OUTPUT_GUARDRAIL_TRIGGERED'
  | 'TOOL_INPUT_GUARDRAIL_TRIGGERED'
  | 'TOOL_OUTPUT_GUARDRAIL_TRIGGERED'
  | 'TOOL_EXECUTION_FAILED'
  | 'TOOL_TIMEOUT'
  | 'MODEL_ERROR'
  | 'SESSION_ERROR'
  | 'SERIALIZATION_ERROR'
  | 'CONFIG_ERROR'
  | 'MODEL_BEHAVIOR_ERROR'
  | 'USER_ERROR'
  | 'RUN_CANCELLED';

export class AgentError extends Error {
  constructor(
    message: string,
    public readonly code: AgentErrorCode,
    public readonly retriable = false,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'AgentError';
  }
}

export class MaxTurnsExceededError extends AgentError {
  constructor(public readonly maxTurns: number) {
    super(`Max turns exceeded: ${maxTurns}`, 'MAX_TURNS_EXCEEDED');
    this.name = 'MaxTurnsExceededError';
  }
}

export class InputGuardrailTriggeredError extends AgentError {
  constructor(public readonly reason: string) {
    super(`Input guardrail triggered: ${reason}`, 'INPUT_GUARDRAIL_TRIGGERED');
    this.name = 'InputGuardrailTriggeredError';
  }
}

export class OutputGuardrailTriggeredError extends AgentError {
  constructor(public readonly reason: string) {
    super(`Output guardrail triggered: ${reason}`, 'OUTPUT_GUARDRAIL_TRIGGERED');
    this.name = 'OutputGuardrailTriggeredError';
  }
}

export class ToolInputGuardrailTriggeredError extends AgentError {
  constructor(
    public readonly toolName: string,
    public readonly reason: string,
  ) {
    super(`Tool input guardrail triggered: ${toolName}: ${reason}`, 'TOOL_INPUT_GUARDRAIL_TRIGGERED');
    this.name = 'ToolInputGuardrailTriggeredError';
  }
}

export class ToolOutputGuardrailTriggeredError extends AgentError {
  constructor(
    public readonly toolName: string,
    public readonly reason: string,
  ) {
    super(`Tool output guardrail triggered: ${toolName}: ${reason}`, 'TOOL_OUTPUT_GUARDRAIL_TRIGGERED');
    this.name = 'ToolOutputGuardrailTriggeredError';
  }
}

export class ToolExecutionFailedError extends AgentError {
  constructor(
    public readonly toolName: string,
    public readonly reason: string,
    cause?: unknown,
  ) {
    super(`Tool execution failed: ${toolName}: ${reason}`, 'TOOL_EXECUTION_FAILED', false, cause);
    this.name = 'ToolExecutionFailedError';
  }
}

export class ToolTimeoutError extends AgentError {
  constructor(
    public readonly toolName: string,
    public readonly timeoutMs: number,
  ) {
    super(`Tool timeout: ${toolName} exceeded ${timeoutMs}ms`, 'TOOL_TIMEOUT');
    this.name = 'ToolTimeoutError';
  }
}

export class ModelError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(`Model error: ${message}`, 'MODEL_ERROR', true, cause);
    this.name = 'ModelError';
  }
}

export class SessionError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(`Session error: ${message}`, 'SESSION_ERROR', true, cause);
    this.name = 'SessionError';
  }
}

export class SerializationError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(`Serialization error: ${message}`, 'SERIALIZATION_ERROR', false, cause);
    this.name = 'SerializationError';
  }
}

export class ConfigError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR', false, cause);
    this.name = 'ConfigError';
  }
}

export class ModelBehaviorError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(`Model behavior error: ${message}`, 'MODEL_BEHAVIOR_ERROR', false, cause);
    this.name = 'ModelBehaviorError';
  }
}

export class UserError extends AgentError {
  constructor(message: string) {
    super(`User error: ${message}`, 'USER_ERROR');
    this.name = 'UserError';
  }
}

export class RunCancelledError extends AgentError {
  constructor(reason = 'Run cancelled') {
    super(reason, 'RUN_CANCELLED');
    this.name = 'RunCancelledError';
  }
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

/** True for backend and session failures; callers decide whether to retry. */
export function isRetriable(error: unknown): boolean {
  return isAgentError(error) && error.retriable;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
