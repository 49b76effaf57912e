/**
 * Lifecycle hooks.
 *
 * Two families:
 *   AgentHooks: attached to one AgentProfile, fire while that agent is current
 *   RunHooks  : attached to a run, fire for every agent
 *
 * Ordering (enforced by HookBus in agent-core):
 *   run-level hooks fire before agent-level hooks, for start-class AND
 *   end-class events. Do not rely on LIFO symmetry.
 *
 * Every method is optional; a missing method is a no-op.
 */

import type { CompletionResponse, JsonObject, JsonValue, Message } from '@turnkit/agent-contracts';
import type { AgentProfile } from './profile.js';

export interface AgentHooks {
  /** Used in log lines and error messages */
  name?: string;

  /** Before each turn while this agent is current */
  onStart?(agent: AgentProfile): Promise<void> | void;

  /** After the agent produced the final output */
  onEnd?(agent: AgentProfile, output: string): Promise<void> | void;

  onLlmStart?(agent: AgentProfile, messages: ReadonlyArray<Message>): Promise<void> | void;

  onLlmEnd?(agent: AgentProfile, response: CompletionResponse): Promise<void> | void;

  /** Fires before name resolution, so it also sees unknown tool names */
  onToolStart?(agent: AgentProfile, toolName: string, args: JsonObject): Promise<void> | void;

  onToolEnd?(agent: AgentProfile, toolName: string, result: JsonValue): Promise<void> | void;

  /** Fires on the source agent's hooks */
  onHandoff?(from: AgentProfile, to: AgentProfile): Promise<void> | void;
}

export interface RunHooks {
  name?: string;

  onAgentStart?(agent: AgentProfile): Promise<void> | void;

  onAgentEnd?(agent: AgentProfile, output: string): Promise<void> | void;

  onHandoff?(from: AgentProfile, to: AgentProfile): Promise<void> | void;
}
