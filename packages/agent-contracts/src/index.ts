// ============================================
// turnkit - Type Contracts
// ============================================

// JSON values
export type { JsonPrimitive, JsonValue, JsonObject } from './json.js';
export { isJsonObject } from './json.js';

// Messages
export type { MessageRole, Message } from './messages.js';

// Tool Types
export type { ToolInputSchema, ToolDefinition, ToolCall, ToolResult } from './tool-types.js';

// Model backend wire shapes
export type {
  JsonSchemaFormat,
  ResponseFormat,
  CompletionRequest,
  CompletionResponse,
  ToolCallDelta,
  StreamChunk,
} from './model.js';

// Errors
export type { AgentErrorCode } from './errors.js';
export {
  AgentError,
  MaxTurnsExceededError,
  InputGuardrailTriggeredError,
  OutputGuardrailTriggeredError,
  ToolInputGuardrailTriggeredError,
  ToolOutputGuardrailTriggeredError,
  ToolExecutionFailedError,
  ToolTimeoutError,
  ModelError,
  SessionError,
  SerializationError,
  ConfigError,
  ModelBehaviorError,
  UserError,
  RunCancelledError,
  isAgentError,
  isRetriable,
  errorMessage,
} from './errors.js';

// Zod Schemas
export type {
  LogLevel,
  HookFailPolicy,
  RunConfigInput,
  RunConfigValues,
  AgentOptionsInput,
  AgentOptionsValues,
} from './agent-schemas.js';
export {
  MessageSchema,
  LogLevelSchema,
  ToolInputSchemaSchema,
  RunConfigSchema,
  AgentOptionsSchema,
  formatZodIssues,
} from './agent-schemas.js';
