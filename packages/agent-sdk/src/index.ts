/**
 * @turnkit/agent-sdk
 *
 * Extension-point interfaces of the runner:
 *   - Tool, Handoff, AgentProfile
 *   - lifecycle hooks and guardrails
 *   - Session and ModelBackend collaborators
 *   - StreamEvent union
 *
 * agent-core provides the runtime that drives them. Test doubles live in the
 * `@turnkit/agent-sdk/testing` sub-path.
 */

export type { Tool } from './tool.js';
export type { AgentProfile, Handoff } from './profile.js';
export type { AgentHooks, RunHooks } from './hooks.js';
export type {
  ValidationResult,
  InputGuardrail,
  OutputGuardrail,
  ToolInputGuardrail,
  ToolOutputGuardrail,
} from './guardrail.js';
export type { Session } from './session.js';
export type { ModelBackend } from './backend.js';
export type {
  StreamEvent,
  StreamEventType,
  RawResponseEvent,
  RunItemStreamEvent,
  AgentUpdatedStreamEvent,
  RunItem,
  RunItemEventName,
} from './stream-events.js';
