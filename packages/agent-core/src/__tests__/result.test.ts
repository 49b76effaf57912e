import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ModelBehaviorError } from '@turnkit/agent-contracts';
import { makeAgent } from '@turnkit/agent-sdk/testing';
import { RunResult } from '../result.js';

const Answer = z.object({ answer: z.number() });

describe('RunResult', () => {
  const agent = makeAgent();

  it('prefers the structured output', () => {
    const result = new RunResult('ignored', agent, 1, { answer: 4 });
    expect(result.finalOutputAs(Answer)).toEqual({ answer: 4 });
  });

  it('parses JSON text when there is no structured output', () => {
    const result = new RunResult('{"answer":7}', agent, 1);
    expect(result.finalOutputAs(Answer)).toEqual({ answer: 7 });
  });

  it('falls back to the raw text', () => {
    const result = new RunResult('plain words', agent, 1);
    expect(result.finalOutputAs(z.string())).toBe('plain words');
  });

  it('throws ModelBehaviorError on a mismatch', () => {
    const result = new RunResult('{"answer":"seven"}', agent, 1);
    expect(() => result.finalOutputAs(Answer)).toThrow(ModelBehaviorError);
    expect(() => result.finalOutputAs(Answer)).toThrow(
      'Model behavior error: Final output does not match schema:\n  • answer: Expected number, received string',
    );
  });

  it('prints as its final output', () => {
    expect(String(new RunResult('done', agent, 3))).toBe('done');
  });
});
