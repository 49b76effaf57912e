/**
 * @turnkit/agent-sdk/testing
 *
 * Test doubles for code that drives or extends the runner. Import from this
 * sub-path, never from the main index.
 *
 * @example
 *   import { makeAgent, ScriptedBackend, makeTool } from '@turnkit/agent-sdk/testing';
 *
 * All helpers use vitest's `vi.fn()`; vitest must be available in the test env.
 */

import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type {
  CompletionRequest,
  CompletionResponse,
  JsonObject,
  JsonValue,
  StreamChunk,
  ToolCall,
} from '@turnkit/agent-contracts';
import type { AgentProfile } from './profile.js';
import type { Tool } from './tool.js';
import type { ModelBackend } from './backend.js';
import type { AgentHooks, RunHooks } from './hooks.js';

// ─── AgentProfile ─────────────────────────────────────────────────────────────

export function makeAgent(overrides: Partial<AgentProfile> = {}): AgentProfile {
  return Object.freeze({
    name: 'test-agent',
    instructions: '',
    model: 'gpt-4',
    tools: [],
    handoffs: [],
    hooks: [],
    inputGuardrails: [],
    outputGuardrails: [],
    toolInputGuardrails: [],
    toolOutputGuardrails: [],
    parallelToolCalls: true,
    ...overrides,
  });
}

// ─── Model responses ──────────────────────────────────────────────────────────

export function makeResponse(overrides: Partial<CompletionResponse> = {}): CompletionResponse {
  return { content: null, toolCalls: [], ...overrides };
}

export function makeToolCall(name: string, args: JsonObject = {}, id = `call_${name}`): ToolCall {
  return { id, name, arguments: args };
}

export function makeChunk(overrides: Partial<StreamChunk> = {}): StreamChunk {
  return { toolCallDeltas: [], ...overrides };
}

// ─── ScriptedBackend ──────────────────────────────────────────────────────────

/** A stream script: chunks in order; an Error entry is thrown mid-stream */
export type StreamScript = Array<StreamChunk | Error>;

/**
 * Backend that replays scripted responses, one per call.
 * An Error entry makes that call reject. Once a script is exhausted its last
 * entry repeats, so a single tool-call response keeps a run looping.
 */
export class ScriptedBackend implements ModelBackend {
  readonly name = 'scripted';
  readonly requests: CompletionRequest[] = [];

  private completeIndex = 0;
  private streamIndex = 0;

  constructor(
    private readonly responses: Array<CompletionResponse | Error> = [],
    private readonly streams: Array<StreamScript | Error> = [],
  ) {}

  readonly complete = vi.fn(async (request: CompletionRequest): Promise<CompletionResponse> => {
    this.requests.push(request);
    const entry = pick(this.responses, this.completeIndex++, 'complete');
    if (entry instanceof Error) {
      throw entry;
    }
    return entry;
  });

  readonly stream = vi.fn(async (request: CompletionRequest): Promise<AsyncIterable<StreamChunk>> => {
    this.requests.push(request);
    const entry = pick(this.streams, this.streamIndex++, 'stream');
    if (entry instanceof Error) {
      throw entry;
    }
    return replay(entry);
  });
}

function pick<T>(script: T[], index: number, kind: string): T {
  const entry = script[Math.min(index, script.length - 1)];
  if (entry === undefined) {
    throw new Error(`ScriptedBackend: no ${kind} script`);
  }
  return entry;
}

async function* replay(script: StreamScript): AsyncGenerator<StreamChunk> {
  for (const entry of script) {
    if (entry instanceof Error) {
      throw entry;
    }
    yield entry;
  }
}

// ─── Tool ─────────────────────────────────────────────────────────────────────

export type ToolImpl = (args: JsonObject) => JsonValue | Promise<JsonValue>;

export function makeTool(
  name: string,
  result: JsonValue | ToolImpl = 'ok',
  overrides: Partial<Omit<Tool, 'name' | 'execute'>> = {},
): Tool & { execute: Mock<(args: JsonObject) => Promise<JsonValue>> } {
  const execute = vi.fn(async (args: JsonObject): Promise<JsonValue> =>
    typeof result === 'function' ? result(args) : result,
  );
  return {
    name,
    description: `${name} tool`,
    parametersSchema: { type: 'object', properties: {} },
    ...overrides,
    execute,
  };
}

// ─── Hooks ────────────────────────────────────────────────────────────────────

/**
 * Hooks that append "<family>:<method>:<agent>" to a shared log.
 * Handoff entries read "<family>:onHandoff:<from>-><to>".
 */
export function recordingHooks(): { calls: string[]; agentHooks: AgentHooks; runHooks: RunHooks } {
  const calls: string[] = [];
  const agentHooks: AgentHooks = {
    name: 'recording-agent-hooks',
    onStart: (agent) => { calls.push(`agent:onStart:${agent.name}`); },
    onEnd: (agent) => { calls.push(`agent:onEnd:${agent.name}`); },
    onLlmStart: (agent) => { calls.push(`agent:onLlmStart:${agent.name}`); },
    onLlmEnd: (agent) => { calls.push(`agent:onLlmEnd:${agent.name}`); },
    onToolStart: (_agent, toolName) => { calls.push(`agent:onToolStart:${toolName}`); },
    onToolEnd: (_agent, toolName) => { calls.push(`agent:onToolEnd:${toolName}`); },
    onHandoff: (from, to) => { calls.push(`agent:onHandoff:${from.name}->${to.name}`); },
  };
  const runHooks: RunHooks = {
    name: 'recording-run-hooks',
    onAgentStart: (agent) => { calls.push(`run:onAgentStart:${agent.name}`); },
    onAgentEnd: (agent) => { calls.push(`run:onAgentEnd:${agent.name}`); },
    onHandoff: (from, to) => { calls.push(`run:onHandoff:${from.name}->${to.name}`); },
  };
  return { calls, agentHooks, runHooks };
}
