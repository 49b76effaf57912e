import { describe, it, expect } from 'vitest';
import type { StreamChunk } from '@turnkit/agent-contracts';
import type { StreamEvent } from '@turnkit/agent-sdk';
import { makeChunk } from '@turnkit/agent-sdk/testing';
import { StreamAccumulator, parseToolArguments } from '../stream-accumulator.js';

async function* chunks(...items: StreamChunk[]): AsyncGenerator<StreamChunk> {
  yield* items;
}

function collect(): { events: StreamEvent[]; accumulator: StreamAccumulator } {
  const events: StreamEvent[] = [];
  return { events, accumulator: new StreamAccumulator((event) => events.push(event)) };
}

describe('parseToolArguments', () => {
  it('parses JSON objects', () => {
    expect(parseToolArguments('{"city":"Lima"}')).toEqual({ city: 'Lima' });
  });

  it('falls back to an empty object', () => {
    expect(parseToolArguments('')).toEqual({});
    expect(parseToolArguments('{"city":')).toEqual({});
    expect(parseToolArguments('[1,2]')).toEqual({});
    expect(parseToolArguments('"text"')).toEqual({});
  });
});

describe('StreamAccumulator', () => {
  it('forwards each text delta as it arrives', async () => {
    const { events, accumulator } = collect();

    const response = await accumulator.consume(
      chunks(makeChunk({ delta: 'Hel' }), makeChunk({ delta: 'lo' }), makeChunk({ finishReason: 'stop' })),
    );

    expect(events).toEqual([
      { type: 'raw_response_event', data: 'Hel' },
      { type: 'raw_response_event', data: 'lo' },
    ]);
    expect(response).toEqual({ content: 'Hello', toolCalls: [], finishReason: 'stop' });
  });

  it('reassembles argument fragments for one index in order', async () => {
    const { accumulator } = collect();

    const response = await accumulator.consume(
      chunks(
        makeChunk({ toolCallDeltas: [{ index: 0, id: 'call_1', name: 'get_weather' }] }),
        makeChunk({ toolCallDeltas: [{ index: 0, arguments: '{"ci' }] }),
        makeChunk({ toolCallDeltas: [{ index: 0, arguments: 'ty":"Li' }] }),
        makeChunk({ toolCallDeltas: [{ index: 0, arguments: 'ma"}' }] }),
        makeChunk({ finishReason: 'tool_calls' }),
      ),
    );

    expect(response.toolCalls).toEqual([{ id: 'call_1', name: 'get_weather', arguments: { city: 'Lima' } }]);
    expect(response.content).toBeUndefined();
  });

  it('keeps interleaved calls apart and orders them by index', async () => {
    const { accumulator } = collect();

    const response = await accumulator.consume(
      chunks(
        makeChunk({ toolCallDeltas: [{ index: 1, id: 'b', name: 'second', arguments: '{"n":' }] }),
        makeChunk({ toolCallDeltas: [{ index: 0, id: 'a', name: 'first', arguments: '{}' }] }),
        makeChunk({ toolCallDeltas: [{ index: 1, arguments: '2}' }], finishReason: 'tool_calls' }),
      ),
    );

    expect(response.toolCalls).toEqual([
      { id: 'a', name: 'first', arguments: {} },
      { id: 'b', name: 'second', arguments: { n: 2 } },
    ]);
  });

  it('handles the minimal name-then-arguments sequence', async () => {
    const { accumulator } = collect();

    const response = await accumulator.consume(
      chunks(
        makeChunk({ toolCallDeltas: [{ index: 0, name: 'f' }] }),
        makeChunk({ toolCallDeltas: [{ index: 0, arguments: '{}' }] }),
        makeChunk({ finishReason: 'tool_calls' }),
      ),
    );

    expect(response.toolCalls).toEqual([{ id: 'call_0', name: 'f', arguments: {} }]);
    expect(response.finishReason).toBe('tool_calls');
  });

  it('drops calls that never received a name', async () => {
    const { accumulator } = collect();

    const response = await accumulator.consume(
      chunks(makeChunk({ toolCallDeltas: [{ index: 0, arguments: '{}' }], finishReason: 'tool_calls' })),
    );

    expect(response.toolCalls).toEqual([]);
  });

  it('stops reading at the first finish reason', async () => {
    const { events, accumulator } = collect();

    const response = await accumulator.consume(
      chunks(makeChunk({ delta: 'done', finishReason: 'stop' }), makeChunk({ delta: 'ignored' })),
    );

    expect(response.content).toBe('done');
    expect(events).toHaveLength(1);
  });

  it('finishes when the stream ends without a finish reason', async () => {
    const { accumulator } = collect();
    const response = await accumulator.consume(chunks(makeChunk({ delta: 'partial' })));
    expect(response).toEqual({ content: 'partial', toolCalls: [], finishReason: undefined });
  });

  it('stops when the signal fires', async () => {
    const { accumulator } = collect();
    const controller = new AbortController();
    controller.abort();

    const response = await accumulator.consume(
      chunks(makeChunk({ delta: 'a' }), makeChunk({ delta: 'b' })),
      controller.signal,
    );

    expect(response.content).toBe('a');
  });
});
