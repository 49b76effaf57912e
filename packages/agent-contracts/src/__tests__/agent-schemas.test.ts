import { describe, it, expect } from 'vitest';
import { AgentOptionsSchema, MessageSchema, RunConfigSchema } from '../agent-schemas.js';

describe('MessageSchema', () => {
  it('accepts the four roles', () => {
    for (const role of ['system', 'user', 'assistant', 'tool']) {
      expect(MessageSchema.safeParse({ role, content: 'x' }).success).toBe(true);
    }
    expect(MessageSchema.safeParse({ role: 'robot', content: 'x' }).success).toBe(false);
    expect(MessageSchema.safeParse({ role: 'user' }).success).toBe(false);
  });
});

describe('AgentOptionsSchema', () => {
  it('fills defaults', () => {
    expect(AgentOptionsSchema.parse({ name: 'Helper' })).toEqual({
      name: 'Helper',
      instructions: '',
      model: 'gpt-4',
      parallelToolCalls: true,
    });
  });

  it('rejects a blank name', () => {
    const result = AgentOptionsSchema.safeParse({ name: '   ' });
    expect(result.success).toBe(false);
    expect(result.error?.errors[0]?.message).toBe('Agent name must not be empty');
  });
});

describe('RunConfigSchema', () => {
  it('fills defaults around the given fields', () => {
    expect(RunConfigSchema.parse({ maxTurns: 3 })).toEqual({
      maxTurns: 3,
      hookFailPolicy: 'fail-closed',
      hookTimeoutMs: 0,
      toolTimeoutMs: 0,
    });
  });

  it('points at the invalid field', () => {
    const result = RunConfigSchema.safeParse({ hookFailPolicy: 'sometimes' });
    expect(result.success).toBe(false);
    expect(result.error?.errors[0]?.path).toEqual(['hookFailPolicy']);
  });
});
