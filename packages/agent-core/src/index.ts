/**
 * @turnkit/agent-core
 *
 * Runtime for agent runs: turn loop, tool dispatch, handoffs, streaming,
 * sessions, configuration and logging.
 */

// Runner
export { Runner } from './core/runner.js';
export type { RunOptions, RunnerOptions } from './core/runner.js';
export { RunResult } from './result.js';
export { StreamedRunResult } from './streaming/streamed-run-result.js';
export type { RunOutcome } from './streaming/streamed-run-result.js';

// Turn loop building blocks
export { TurnLoop, buildRequest } from './core/turn-loop.js';
export type { TurnLoopOptions, ModelMode } from './core/turn-loop.js';
export { Dispatcher, isHandoffMarker } from './core/dispatcher.js';
export type { DispatchOutcome, DispatcherOptions, EventSink } from './core/dispatcher.js';
export { withTimeout } from './core/timeout.js';
export { HookBus } from './hooks/hook-bus.js';
export type { HookBusOptions } from './hooks/hook-bus.js';
export { GuardrailPipeline } from './guardrails/guardrail-pipeline.js';
export { ConversationState, renderToolMessage } from './conversation/conversation-state.js';
export { ToolCatalog } from './tools/tool-catalog.js';
export type { CatalogEntry } from './tools/tool-catalog.js';

// Streaming
export { StreamAccumulator, parseToolArguments } from './streaming/stream-accumulator.js';
export { EventChannel } from './streaming/event-channel.js';

// Agents, tools, handoffs
export { createAgent, cloneAgent } from './agents/create-agent.js';
export type { CreateAgentOptions } from './agents/create-agent.js';
export { defineTool } from './tools/function-tool.js';
export type { FunctionToolOptions } from './tools/function-tool.js';
export { createHandoff, handoffToolName, defaultHandoffDescription } from './handoffs/handoff.js';
export type { AgentRef, HandoffOptions } from './handoffs/handoff.js';
export { jsonSchemaToZod } from './schema-converter.js';

// Sessions
export { InMemorySession } from './sessions/in-memory-session.js';
export { SqliteSession, SESSION_SCHEMA } from './sessions/sqlite-session.js';
export type { SqliteSessionOptions } from './sessions/sqlite-session.js';

// Configuration & logging
export { parseRunConfig, loadRunConfig } from './config/run-config.js';
export { createLogger, createSilentLogger, resolveLogLevel } from './logging/logger.js';
export type { Logger, LoggerConfig } from './logging/logger.js';
