/**
 * TurnLoop: the bounded request/dispatch cycle shared by sync and
 * streaming runs.
 *
 * Per turn:
 *   1. cancellation check
 *   2. onAgentStart (run) → onStart (agent)
 *   3. build request from the full log and the current catalog
 *   4. onLlmStart → backend → onLlmEnd
 *   5. terminal (text, no tool calls) → finish; the only normal exit
 *   6. otherwise dispatch each tool call in order, applying handoffs as
 *      they resolve
 * After `maxTurns` turns without a terminal response → MaxTurnsExceededError.
 */

import {
  MaxTurnsExceededError,
  MessageSchema,
  ModelBehaviorError,
  ModelError,
  RunCancelledError,
  SessionError,
  errorMessage,
  formatZodIssues,
  isAgentError,
  type CompletionRequest,
  type CompletionResponse,
  type JsonObject,
  type JsonValue,
  type Message,
  type RunConfigValues,
} from '@turnkit/agent-contracts';
import type { AgentProfile, ModelBackend, RunHooks, Session } from '@turnkit/agent-sdk';
import { ConversationState } from '../conversation/conversation-state.js';
import { ToolCatalog } from '../tools/tool-catalog.js';
import { HookBus } from '../hooks/hook-bus.js';
import { GuardrailPipeline } from '../guardrails/guardrail-pipeline.js';
import { StreamAccumulator } from '../streaming/stream-accumulator.js';
import { jsonSchemaToZod } from '../schema-converter.js';
import { RunResult } from '../result.js';
import type { Logger } from '../logging/logger.js';
import { Dispatcher, type EventSink } from './dispatcher.js';

export type ModelMode = 'complete' | 'stream';

export interface TurnLoopOptions {
  backend: ModelBackend;
  mode: ModelMode;
  config: RunConfigValues;
  session?: Session;
  runHooks: ReadonlyArray<RunHooks>;
  logger: Logger;
  emit: EventSink;
  signal: AbortSignal;
}

export function buildRequest(
  agent: AgentProfile,
  catalog: ToolCatalog,
  messages: Message[],
  signal?: AbortSignal,
): CompletionRequest {
  const request: CompletionRequest = {
    messages,
    model: agent.model,
    parallelToolCalls: agent.parallelToolCalls,
    signal,
  };
  if (catalog.size > 0) {
    request.tools = catalog.definitions();
  }
  if (agent.outputSchema) {
    request.responseFormat = {
      type: 'json_schema',
      jsonSchema: { name: agent.outputName ?? 'output', schema: agent.outputSchema, strict: true },
    };
  }
  return request;
}

function toSessionItem(message: Message): JsonObject {
  return { role: message.role, content: message.content };
}

export class TurnLoop {
  private readonly hooks: HookBus;
  private readonly guardrails: GuardrailPipeline;
  private readonly dispatcher: Dispatcher;

  constructor(private readonly options: TurnLoopOptions) {
    const { config, logger } = options;
    this.hooks = new HookBus(options.runHooks, {
      failPolicy: config.hookFailPolicy,
      timeoutMs: config.hookTimeoutMs,
      logger,
    });
    this.guardrails = new GuardrailPipeline(logger);
    this.dispatcher = new Dispatcher({
      hooks: this.hooks,
      guardrails: this.guardrails,
      emit: options.emit,
      logger,
      toolTimeoutMs: config.toolTimeoutMs,
    });
  }

  async run(startingAgent: AgentProfile, input: string): Promise<RunResult> {
    const { config, logger } = this.options;
    const maxTurns = config.maxTurns;

    let agent = startingAgent;
    let catalog = new ToolCatalog(agent);

    const safeInput = await this.guardrails.checkInput(agent, input);
    const history = await this.loadHistory();
    const state = ConversationState.seed(agent.instructions, history, safeInput);

    logger.info({ agent: agent.name, maxTurns, historyItems: history.length }, 'Run started');

    for (let turn = 0; turn < maxTurns; turn++) {
      this.throwIfCancelled();
      const log = logger.child({ agent: agent.name, turn });

      await this.hooks.agentStart(agent);

      const request = buildRequest(agent, catalog, state.snapshot(), this.options.signal);
      await this.hooks.llmStart(agent, request.messages);
      log.debug({ messages: request.messages.length, tools: catalog.size }, 'Calling model');
      const response = await this.callModel(request);
      await this.hooks.llmEnd(agent, response);

      const content = typeof response.content === 'string' ? response.content : undefined;

      if (content !== undefined && response.toolCalls.length === 0) {
        const result = await this.finish(agent, state, content, turn + 1);
        log.info({ turns: result.turns }, 'Run finished');
        return result;
      }

      // Text alongside tool calls is intermediate commentary
      if (content !== undefined) {
        state.appendAssistant(content);
        this.emitMessage(content);
      }

      for (const call of response.toolCalls) {
        const outcome = await this.dispatcher.dispatch(agent, catalog, call);
        state.appendTool({ name: call.name, output: outcome.output });

        // A handoff that swaps agents reports through handoff_occurred instead
        if (outcome.kind === 'handoff' && outcome.target) {
          const next = await this.handoff(agent, outcome.target, state);
          agent = next.agent;
          catalog = next.catalog;
        } else {
          this.options.emit({
            type: 'run_item_stream_event',
            name: 'tool_output',
            item: { type: 'tool_output', callId: call.id, name: call.name, output: JSON.stringify(outcome.output) },
          });
        }
      }
    }

    logger.warn({ agent: agent.name, maxTurns }, 'Max turns exceeded');
    throw new MaxTurnsExceededError(maxTurns);
  }

  // ── Terminal case ──────────────────────────────────────────────

  private async finish(
    agent: AgentProfile,
    state: ConversationState,
    content: string,
    turns: number,
  ): Promise<RunResult> {
    const output = await this.guardrails.checkOutput(agent, content);
    this.emitMessage(output);
    await this.hooks.agentEnd(agent, output);

    const lastBeforeResponse = state.last();
    const assistant = state.appendAssistant(output);

    const { session } = this.options;
    if (session) {
      const items = lastBeforeResponse ? [lastBeforeResponse, assistant] : [assistant];
      await this.sessionCall('save history', () => session.addItems(items.map(toSessionItem)));
    }

    const structured = agent.outputSchema
      ? this.parseStructured(agent.outputSchema, agent.outputName ?? 'output', output)
      : undefined;
    return new RunResult(output, agent, turns, structured);
  }

  private parseStructured(schema: Record<string, unknown>, name: string, output: string): JsonValue {
    let value: JsonValue;
    try {
      value = JSON.parse(output);
    } catch (error) {
      throw new ModelBehaviorError(`Structured output is not valid JSON: ${errorMessage(error)}`, error);
    }

    const check = jsonSchemaToZod(schema).safeParse(value);
    if (!check.success) {
      throw new ModelBehaviorError(`Structured output does not match "${name}":\n${formatZodIssues(check.error)}`, check.error);
    }
    return value;
  }

  // ── Handoff ────────────────────────────────────────────────────

  private async handoff(
    from: AgentProfile,
    to: AgentProfile,
    state: ConversationState,
  ): Promise<{ agent: AgentProfile; catalog: ToolCatalog }> {
    await this.hooks.handoff(from, to);

    const catalog = new ToolCatalog(to);
    state.syncSystemMessage(to.instructions);

    this.options.logger.info({ from: from.name, to: to.name }, 'Handoff');
    this.options.emit({
      type: 'run_item_stream_event',
      name: 'handoff_occurred',
      item: { type: 'handoff_occurred', fromAgent: from.name, agentName: to.name },
    });
    this.options.emit({ type: 'agent_updated_stream_event', newAgent: to });

    return { agent: to, catalog };
  }

  // ── Backend ────────────────────────────────────────────────────

  private async callModel(request: CompletionRequest): Promise<CompletionResponse> {
    const { backend, mode, emit } = this.options;
    try {
      if (mode === 'complete') {
        return await backend.complete(request);
      }
      const stream = await backend.stream(request);
      const response = await new StreamAccumulator(emit).consume(stream, this.options.signal);
      this.throwIfCancelled();
      return response;
    } catch (error) {
      this.throwIfCancelled();
      if (mode === 'stream') {
        emit({ type: 'raw_response_event', data: `Error: ${errorMessage(error)}` });
      }
      if (isAgentError(error)) {
        throw error;
      }
      throw new ModelError(errorMessage(error), error);
    }
  }

  // ── Session ────────────────────────────────────────────────────

  /** Stored items that are not valid messages are skipped */
  private async loadHistory(): Promise<Message[]> {
    const { session, logger } = this.options;
    if (!session) {
      return [];
    }
    const items = await this.sessionCall('load history', () => session.getItems());
    const history: Message[] = [];
    for (const item of items) {
      const parsed = MessageSchema.safeParse(item);
      if (parsed.success) {
        history.push(parsed.data);
      } else {
        logger.debug({ item }, 'Skipping invalid session item');
      }
    }
    return history;
  }

  private async sessionCall<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isAgentError(error)) {
        throw error;
      }
      throw new SessionError(`Failed to ${action}: ${errorMessage(error)}`, error);
    }
  }

  private emitMessage(content: string): void {
    this.options.emit({
      type: 'run_item_stream_event',
      name: 'message_output_created',
      item: { type: 'message_output', content },
    });
  }

  private throwIfCancelled(): void {
    if (this.options.signal.aborted) {
      throw new RunCancelledError();
    }
  }
}
