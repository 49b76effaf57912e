/**
 * Runner: entry point for executing an agent.
 *
 *   run()         → awaits the whole turn loop, resolves a RunResult
 *   runStreamed() → starts the loop in the background, returns a
 *                   StreamedRunResult fed through an EventChannel
 *
 * Both modes share one TurnLoop; only the model call differs
 * (complete() vs stream() + StreamAccumulator).
 */

import {
  ConfigError,
  type RunConfigInput,
  type RunConfigValues,
} from '@turnkit/agent-contracts';
import type {
  AgentProfile,
  ModelBackend,
  RunHooks,
  Session,
  StreamEvent,
} from '@turnkit/agent-sdk';
import { parseRunConfig } from '../config/run-config.js';
import { createLogger, type Logger } from '../logging/logger.js';
import type { RunResult } from '../result.js';
import { EventChannel } from '../streaming/event-channel.js';
import { StreamedRunResult, type RunOutcome } from '../streaming/streamed-run-result.js';
import { TurnLoop, type ModelMode } from './turn-loop.js';
import type { EventSink } from './dispatcher.js';

export interface RunOptions extends RunConfigInput {
  /** Conversation history store; loaded before the first turn, appended on success */
  session?: Session;
  /** Overrides the runner's backend for this run */
  backend?: ModelBackend;
  runHooks?: RunHooks[];
  /** Overrides the runner's logger for this run */
  logger?: Logger;
  /** Observes every StreamEvent; a throwing callback fails the run */
  onEvent?: (event: StreamEvent) => void;
  /** Aborting it cancels the run */
  signal?: AbortSignal;
}

export interface RunnerOptions {
  backend?: ModelBackend;
  logger?: Logger;
  /** Defaults applied under each run's own options */
  defaults?: RunConfigInput;
}

interface PreparedRun {
  loop: TurnLoop;
  /** Unsubscribes from the caller's abort signal */
  release: () => void;
}

export class Runner {
  private readonly backend: ModelBackend | undefined;
  private readonly logger: Logger;
  private readonly defaults: RunConfigInput;

  constructor(options: RunnerOptions = {}) {
    this.backend = options.backend;
    this.logger = options.logger ?? createLogger({ level: options.defaults?.logLevel });
    this.defaults = options.defaults ?? {};
  }

  /**
   * Run to completion.
   * @throws AgentError subclasses (MaxTurnsExceededError, ModelError, ...)
   */
  async run(agent: AgentProfile, input: string, options: RunOptions = {}): Promise<RunResult> {
    const emit: EventSink = (event) => options.onEvent?.(event);
    const prepared = this.prepare(options, 'complete', emit);
    try {
      return await prepared.loop.run(agent, input);
    } finally {
      prepared.release();
    }
  }

  /**
   * Start a run in the background. Configuration errors surface through
   * finalResult(), like every other failure.
   */
  runStreamed(agent: AgentProfile, input: string, options: RunOptions = {}): StreamedRunResult {
    const channel = new EventChannel<StreamEvent>();
    let current = agent;
    const emit: EventSink = (event) => {
      if (event.type === 'agent_updated_stream_event') {
        current = event.newAgent;
      }
      channel.write(event);
      options.onEvent?.(event);
    };

    const controller = new AbortController();
    const outcome = this.execute(agent, input, options, emit, controller)
      .then(
        (result): RunOutcome => ({ ok: true, result }),
        (error: unknown): RunOutcome => ({ ok: false, error }),
      )
      .then((settled) => {
        channel.close();
        return settled;
      });

    return new StreamedRunResult(channel, outcome, controller, () => current);
  }

  private async execute(
    agent: AgentProfile,
    input: string,
    options: RunOptions,
    emit: EventSink,
    controller: AbortController,
  ): Promise<RunResult> {
    const prepared = this.prepare(options, 'stream', emit, controller);
    try {
      return await prepared.loop.run(agent, input);
    } finally {
      prepared.release();
    }
  }

  private prepare(
    options: RunOptions,
    mode: ModelMode,
    emit: EventSink,
    controller = new AbortController(),
  ): PreparedRun {
    const config = this.resolveConfig(options);

    const backend = options.backend ?? this.backend;
    if (!backend) {
      throw new ConfigError('No model backend: pass one to new Runner({ backend }) or in the run options');
    }

    const base = options.logger ?? this.logger;
    const logger = config.logLevel ? base.child({}, { level: config.logLevel }) : base;

    const unlink = options.signal ? forwardAbort(options.signal, controller) : () => undefined;

    const loop = new TurnLoop({
      backend,
      mode,
      config,
      session: options.session,
      runHooks: options.runHooks ?? [],
      logger: logger.child({ backend: backend.name ?? 'backend', mode }),
      emit,
      signal: controller.signal,
    });

    return { loop, release: unlink };
  }

  private resolveConfig(options: RunOptions): RunConfigValues {
    return parseRunConfig({
      maxTurns: options.maxTurns ?? this.defaults.maxTurns,
      hookFailPolicy: options.hookFailPolicy ?? this.defaults.hookFailPolicy,
      hookTimeoutMs: options.hookTimeoutMs ?? this.defaults.hookTimeoutMs,
      toolTimeoutMs: options.toolTimeoutMs ?? this.defaults.toolTimeoutMs,
      logLevel: options.logLevel ?? this.defaults.logLevel,
    });
  }
}

/** Abort `controller` when `signal` fires; returns the unsubscribe */
function forwardAbort(signal: AbortSignal, controller: AbortController): () => void {
  if (signal.aborted) {
    controller.abort(signal.reason);
    return () => undefined;
  }
  const onAbort = (): void => controller.abort(signal.reason);
  signal.addEventListener('abort', onAbort, { once: true });
  return () => signal.removeEventListener('abort', onAbort);
}
