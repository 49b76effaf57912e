import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  ModelError,
  OutputGuardrailTriggeredError,
  RunCancelledError,
  UserError,
} from '@turnkit/agent-contracts';
import type { StreamEvent } from '@turnkit/agent-sdk';
import { ScriptedBackend, makeAgent, makeChunk, makeTool } from '@turnkit/agent-sdk/testing';
import { Runner } from '../../core/runner.js';
import { createAgent } from '../../agents/create-agent.js';
import { createSilentLogger } from '../../logging/logger.js';
import { InMemorySession } from '../../sessions/in-memory-session.js';
import type { StreamedRunResult } from '../streamed-run-result.js';

const logger = createSilentLogger();

async function collect(result: StreamedRunResult): Promise<StreamEvent[]> {
  const events: StreamEvent[] = [];
  for await (const event of result.streamEvents()) {
    events.push(event);
  }
  return events;
}

function eventNames(events: StreamEvent[]): string[] {
  return events.map((event) => (event.type === 'run_item_stream_event' ? event.name : event.type));
}

/** One stream that calls `name` forever */
function loopingBackend(name: string): ScriptedBackend {
  return new ScriptedBackend(
    [],
    [[makeChunk({ toolCallDeltas: [{ index: 0, name }], finishReason: 'tool_calls' })]],
  );
}

describe('Runner.runStreamed', () => {
  it('forwards text deltas and resolves the final result', async () => {
    const backend = new ScriptedBackend(
      [],
      [[makeChunk({ delta: 'Hel' }), makeChunk({ delta: 'lo' }), makeChunk({ finishReason: 'stop' })]],
    );

    const run = new Runner({ backend, logger }).runStreamed(makeAgent(), 'Hi');
    const events = await collect(run);
    const result = await run.finalResult();

    expect(events).toEqual([
      { type: 'raw_response_event', data: 'Hel' },
      { type: 'raw_response_event', data: 'lo' },
      {
        type: 'run_item_stream_event',
        name: 'message_output_created',
        item: { type: 'message_output', content: 'Hello' },
      },
    ]);
    expect(result.finalOutput).toBe('Hello');
    expect(run.isComplete).toBe(true);
    expect(backend.complete).not.toHaveBeenCalled();
  });

  it('assembles streamed tool calls before dispatching them', async () => {
    const f = makeTool('f', 'ok');
    const backend = new ScriptedBackend(
      [],
      [
        [
          makeChunk({ toolCallDeltas: [{ index: 0, id: 'call_f', name: 'f' }] }),
          makeChunk({ toolCallDeltas: [{ index: 0, arguments: '{}' }] }),
          makeChunk({ finishReason: 'tool_calls' }),
        ],
        [makeChunk({ delta: 'done', finishReason: 'stop' })],
      ],
    );

    const run = new Runner({ backend, logger }).runStreamed(makeAgent({ tools: [f] }), 'go');
    const events = await collect(run);
    const result = await run.finalResult();

    expect(f.execute).toHaveBeenCalledWith({});
    expect(eventNames(events)).toEqual(['tool_called', 'tool_output', 'raw_response_event', 'message_output_created']);
    expect(events[0]).toEqual({
      type: 'run_item_stream_event',
      name: 'tool_called',
      item: { type: 'tool_call', callId: 'call_f', name: 'f', arguments: {} },
    });
    expect(result.finalOutput).toBe('done');
    expect(result.turns).toBe(2);
  });

  it('keeps going after a stream with no text and no tool calls', async () => {
    const backend = new ScriptedBackend(
      [],
      [[makeChunk({ finishReason: 'stop' })], [makeChunk({ delta: 'ok', finishReason: 'stop' })]],
    );

    const result = await new Runner({ backend, logger }).runStreamed(makeAgent(), 'go').finalResult();

    expect(result.finalOutput).toBe('ok');
    expect(result.turns).toBe(2);
  });

  it('reports a stream that fails to open', async () => {
    const backend = new ScriptedBackend([], [new Error('connection refused')]);

    const run = new Runner({ backend, logger }).runStreamed(makeAgent(), 'go');
    const events = await collect(run);

    expect(events).toEqual([{ type: 'raw_response_event', data: 'Error: connection refused' }]);
    await expect(run.finalResult()).rejects.toThrow(new ModelError('connection refused'));
  });

  it('reports a stream that fails midway', async () => {
    const backend = new ScriptedBackend([], [[makeChunk({ delta: 'par' }), new Error('reset')]]);

    const run = new Runner({ backend, logger }).runStreamed(makeAgent(), 'go');
    const events = await collect(run);

    expect(events).toEqual([
      { type: 'raw_response_event', data: 'par' },
      { type: 'raw_response_event', data: 'Error: reset' },
    ]);
    await expect(run.finalResult()).rejects.toBeInstanceOf(ModelError);
  });

  it('allows streamEvents() only once', async () => {
    const backend = new ScriptedBackend([], [[makeChunk({ delta: 'x', finishReason: 'stop' })]]);
    const run = new Runner({ backend, logger }).runStreamed(makeAgent(), 'go');

    run.streamEvents();

    expect(() => run.streamEvents()).toThrow(UserError);
    expect(() => run.streamEvents()).toThrow('User error: streamEvents() can only be consumed once');
    await expect(run.finalResult()).resolves.toMatchObject({ finalOutput: 'x' });
  });

  it('drains unread events when only the final result is awaited', async () => {
    const backend = new ScriptedBackend([], [[makeChunk({ delta: 'a' }), makeChunk({ delta: 'b', finishReason: 'stop' })]]);
    const seen: StreamEvent[] = [];

    const run = new Runner({ backend, logger }).runStreamed(makeAgent(), 'go', { onEvent: (e) => seen.push(e) });
    const result = await run.finalResult();

    expect(result.finalOutput).toBe('ab');
    expect(eventNames(seen)).toEqual(['raw_response_event', 'raw_response_event', 'message_output_created']);
    expect(() => run.streamEvents()).toThrow(UserError);
  });

  it('cancels the run when the consumer stops early', async () => {
    const backend = loopingBackend('spin');
    const spin = makeTool('spin');

    const run = new Runner({ backend, logger }).runStreamed(makeAgent({ tools: [spin] }), 'go');
    const first: StreamEvent[] = [];
    for await (const event of run.streamEvents()) {
      first.push(event);
      break;
    }

    expect(eventNames(first)).toEqual(['tool_called']);
    await expect(run.finalResult()).rejects.toBeInstanceOf(RunCancelledError);
  });

  it('keeps the result of a run that finished before the consumer stopped', async () => {
    const backend = new ScriptedBackend([], [[makeChunk({ delta: 'Hello', finishReason: 'stop' })]]);
    const session = new InMemorySession();

    const run = new Runner({ backend, logger }).runStreamed(makeAgent(), 'hi', { session });
    for await (const event of run.streamEvents()) {
      if (event.type === 'run_item_stream_event' && event.name === 'message_output_created') {
        break;
      }
    }

    await expect(run.finalResult()).resolves.toMatchObject({ finalOutput: 'Hello' });
    expect(await session.getItems()).toEqual([
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'Hello' },
    ]);
  });

  it('publishes the final message after output guardrails', async () => {
    const backend = new ScriptedBackend([], [[makeChunk({ delta: 'secret', finishReason: 'stop' })]]);
    const agent = makeAgent({
      outputGuardrails: [
        { name: 'redact', check: () => ({ ok: false, reason: 'secret', action: 'sanitize', sanitized: '[redacted]' }) },
      ],
    });

    const run = new Runner({ backend, logger }).runStreamed(agent, 'go');
    const events = await collect(run);
    const result = await run.finalResult();

    expect(result.finalOutput).toBe('[redacted]');
    expect(events.at(-1)).toEqual({
      type: 'run_item_stream_event',
      name: 'message_output_created',
      item: { type: 'message_output', content: '[redacted]' },
    });
  });

  it('never publishes a rejected final message', async () => {
    const backend = new ScriptedBackend([], [[makeChunk({ delta: 'secret', finishReason: 'stop' })]]);
    const agent = makeAgent({
      outputGuardrails: [{ name: 'block', check: () => ({ ok: false, reason: 'leak', action: 'reject' }) }],
    });

    const run = new Runner({ backend, logger }).runStreamed(agent, 'go');
    const events = await collect(run);

    expect(eventNames(events)).toEqual(['raw_response_event']);
    await expect(run.finalResult()).rejects.toBeInstanceOf(OutputGuardrailTriggeredError);
  });

  it('cancels before the first turn', async () => {
    const backend = loopingBackend('spin');

    const run = new Runner({ backend, logger }).runStreamed(makeAgent({ tools: [makeTool('spin')] }), 'go');
    run.cancel();

    await expect(run.finalResult()).rejects.toBeInstanceOf(RunCancelledError);
    expect(backend.stream).not.toHaveBeenCalled();
  });

  it('ignores cancel() after the run finished', async () => {
    const backend = new ScriptedBackend([], [[makeChunk({ delta: 'ok', finishReason: 'stop' })]]);
    const run = new Runner({ backend, logger }).runStreamed(makeAgent(), 'go');

    await collect(run);
    run.cancel();

    await expect(run.finalResult()).resolves.toMatchObject({ finalOutput: 'ok' });
  });

  it('tracks the current agent across a handoff', async () => {
    const billing = createAgent({ name: 'B' });
    const front = createAgent({ name: 'A', handoffs: [billing] });
    const backend = new ScriptedBackend(
      [],
      [
        [makeChunk({ toolCallDeltas: [{ index: 0, name: 'transfer_to_b' }], finishReason: 'tool_calls' })],
        [makeChunk({ delta: 'hi from B', finishReason: 'stop' })],
      ],
    );

    const run = new Runner({ backend, logger }).runStreamed(front, 'go');
    expect(run.currentAgent).toBe(front);

    const events = await collect(run);
    const result = await run.finalResult();

    expect(eventNames(events)).toEqual([
      'tool_called',
      'handoff_requested',
      'handoff_occurred',
      'agent_updated_stream_event',
      'raw_response_event',
      'message_output_created',
    ]);
    expect(run.currentAgent).toBe(billing);
    expect(result.lastAgent).toBe(billing);
  });

  it('surfaces hook failures through finalResult', async () => {
    const backend = new ScriptedBackend([], [[makeChunk({ delta: 'ok', finishReason: 'stop' })]]);
    const agent = makeAgent({ hooks: [{ onStart: () => { throw new Error('hook down'); } }] });

    const run = new Runner({ backend, logger }).runStreamed(agent, 'go');

    expect(await collect(run)).toEqual([]);
    await expect(run.finalResult()).rejects.toThrow('hook down');
  });

  it('surfaces a missing backend through finalResult', async () => {
    const run = new Runner({ logger }).runStreamed(makeAgent(), 'go');
    await expect(run.finalResult()).rejects.toBeInstanceOf(ConfigError);
  });
});
