/**
 * HookBus: invokes lifecycle hooks in a fixed order with one failure policy.
 *
 * Order: run-level hooks, then the current agent's hooks, for start-class
 * and end-class events alike. Within a family, hooks fire in registration
 * order.
 *
 * Failure policy (same in sync and streaming runs):
 *   fail-closed: the hook's error aborts the run
 *   fail-open: the error is logged and the next hook runs
 */

import type {
  AgentProfile,
  AgentHooks,
  RunHooks,
} from '@turnkit/agent-sdk';
import type {
  CompletionResponse,
  HookFailPolicy,
  JsonObject,
  JsonValue,
  Message,
} from '@turnkit/agent-contracts';
import { errorMessage } from '@turnkit/agent-contracts';
import type { Logger } from '../logging/logger.js';
import { withTimeout } from '../core/timeout.js';

export interface HookBusOptions {
  failPolicy: HookFailPolicy;
  /** 0 = no timeout */
  timeoutMs: number;
  logger: Logger;
}

export class HookBus {
  constructor(
    private readonly runHooks: ReadonlyArray<RunHooks>,
    private readonly options: HookBusOptions,
  ) {}

  async agentStart(agent: AgentProfile): Promise<void> {
    for (const hooks of this.runHooks) {
      const fn = hooks.onAgentStart;
      if (fn) {
        await this.invoke(hooks.name, 'onAgentStart', () => fn.call(hooks, agent));
      }
    }
    await this.eachAgentHook(agent.hooks, 'onStart', (hooks) => hooks.onStart?.(agent));
  }

  async agentEnd(agent: AgentProfile, output: string): Promise<void> {
    for (const hooks of this.runHooks) {
      const fn = hooks.onAgentEnd;
      if (fn) {
        await this.invoke(hooks.name, 'onAgentEnd', () => fn.call(hooks, agent, output));
      }
    }
    await this.eachAgentHook(agent.hooks, 'onEnd', (hooks) => hooks.onEnd?.(agent, output));
  }

  async llmStart(agent: AgentProfile, messages: ReadonlyArray<Message>): Promise<void> {
    await this.eachAgentHook(agent.hooks, 'onLlmStart', (hooks) => hooks.onLlmStart?.(agent, messages));
  }

  async llmEnd(agent: AgentProfile, response: CompletionResponse): Promise<void> {
    await this.eachAgentHook(agent.hooks, 'onLlmEnd', (hooks) => hooks.onLlmEnd?.(agent, response));
  }

  async toolStart(agent: AgentProfile, toolName: string, args: JsonObject): Promise<void> {
    await this.eachAgentHook(agent.hooks, 'onToolStart', (hooks) => hooks.onToolStart?.(agent, toolName, args));
  }

  async toolEnd(agent: AgentProfile, toolName: string, result: JsonValue): Promise<void> {
    await this.eachAgentHook(agent.hooks, 'onToolEnd', (hooks) => hooks.onToolEnd?.(agent, toolName, result));
  }

  /** Run-level onHandoff, then the source agent's onHandoff */
  async handoff(from: AgentProfile, to: AgentProfile): Promise<void> {
    for (const hooks of this.runHooks) {
      const fn = hooks.onHandoff;
      if (fn) {
        await this.invoke(hooks.name, 'onHandoff', () => fn.call(hooks, from, to));
      }
    }
    await this.eachAgentHook(from.hooks, 'onHandoff', (hooks) => hooks.onHandoff?.(from, to));
  }

  private async eachAgentHook(
    list: ReadonlyArray<AgentHooks>,
    hookName: keyof AgentHooks,
    call: (hooks: AgentHooks) => Promise<void> | void,
  ): Promise<void> {
    for (const hooks of list) {
      if (typeof hooks[hookName] === 'function') {
        await this.invoke(hooks.name, hookName, () => call(hooks));
      }
    }
  }

  private async invoke(
    owner: string | undefined,
    hookName: string,
    fn: () => Promise<void> | void,
  ): Promise<void> {
    const label = `${owner ?? 'anonymous'}.${hookName}`;
    try {
      await withTimeout(
        fn(),
        this.options.timeoutMs,
        () => new Error(`Hook "${label}" timed out after ${this.options.timeoutMs}ms`),
      );
    } catch (error) {
      if (this.options.failPolicy === 'fail-closed') {
        throw error;
      }
      this.options.logger.warn({ hook: label, err: errorMessage(error) }, 'Hook failed, continuing (fail-open)');
    }
  }
}
