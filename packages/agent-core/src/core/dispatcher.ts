/**
 * Dispatcher: executes one tool call against the current catalog.
 *
 * Sequence per call:
 *   onToolStart → tool_called → resolve (tools, then handoffs)
 *   → [handoff_requested] → tool-input guardrails → execute (timeout)
 *   → tool-output guardrails → onToolEnd
 *
 * Appending the tool message, emitting tool_output and applying a handoff
 * are left to the turn loop, which owns the conversation and current agent.
 */

import {
  ToolExecutionFailedError,
  ToolTimeoutError,
  errorMessage,
  isAgentError,
  isJsonObject,
  type JsonValue,
  type ToolCall,
} from '@turnkit/agent-contracts';
import type { AgentProfile, StreamEvent } from '@turnkit/agent-sdk';
import type { HookBus } from '../hooks/hook-bus.js';
import type { GuardrailPipeline } from '../guardrails/guardrail-pipeline.js';
import type { ToolCatalog } from '../tools/tool-catalog.js';
import type { Logger } from '../logging/logger.js';
import { withTimeout } from './timeout.js';

export type EventSink = (event: StreamEvent) => void;

/** For a handoff, `target` is set only when the result carried the marker */
export type DispatchOutcome =
  | { kind: 'tool'; call: ToolCall; output: JsonValue }
  | { kind: 'handoff'; call: ToolCall; output: JsonValue; target?: AgentProfile };

export interface DispatcherOptions {
  hooks: HookBus;
  guardrails: GuardrailPipeline;
  emit: EventSink;
  logger: Logger;
  /** Run-level default; a tool's own timeoutMs wins. 0 = none */
  toolTimeoutMs: number;
}

/** `{"assistant": "<name>"}` marks a completed handoff */
export function isHandoffMarker(output: JsonValue): boolean {
  return isJsonObject(output) && typeof output.assistant === 'string';
}

export class Dispatcher {
  constructor(private readonly options: DispatcherOptions) {}

  async dispatch(agent: AgentProfile, catalog: ToolCatalog, call: ToolCall): Promise<DispatchOutcome> {
    const { hooks, guardrails, emit } = this.options;
    const log = this.options.logger.child({ agent: agent.name, tool: call.name });

    await hooks.toolStart(agent, call.name, call.arguments);
    emit({
      type: 'run_item_stream_event',
      name: 'tool_called',
      item: { type: 'tool_call', callId: call.id, name: call.name, arguments: call.arguments },
    });

    const entry = catalog.resolve(call.name);
    if (!entry) {
      throw new ToolExecutionFailedError(call.name, `Tool '${call.name}' not found`);
    }

    if (entry.kind === 'handoff') {
      emit({
        type: 'run_item_stream_event',
        name: 'handoff_requested',
        item: { type: 'handoff_requested', agentName: entry.handoff.targetAgent().name },
      });
    }

    const args = await guardrails.checkToolInput(agent, call.name, call.arguments);

    log.debug({ kind: entry.kind }, 'Dispatching tool call');
    const raw =
      entry.kind === 'tool'
        ? await this.execute(call.name, () => entry.tool.execute(args), entry.tool.timeoutMs)
        : await this.execute(call.name, () => entry.handoff.execute(args), undefined);

    const output = await guardrails.checkToolOutput(agent, call.name, raw);
    await hooks.toolEnd(agent, call.name, output);

    if (entry.kind === 'tool') {
      return { kind: 'tool', call, output };
    }
    return isHandoffMarker(output)
      ? { kind: 'handoff', call, output, target: entry.handoff.targetAgent() }
      : { kind: 'handoff', call, output };
  }

  private async execute(
    toolName: string,
    run: () => Promise<JsonValue>,
    toolTimeoutMs: number | undefined,
  ): Promise<JsonValue> {
    const timeoutMs = toolTimeoutMs ?? this.options.toolTimeoutMs;
    try {
      return await withTimeout(run(), timeoutMs, () => new ToolTimeoutError(toolName, timeoutMs));
    } catch (error) {
      if (isAgentError(error)) {
        throw error;
      }
      throw new ToolExecutionFailedError(toolName, errorMessage(error), error);
    }
  }
}
