import { describe, it, expect } from 'vitest';
import type { AgentProfile } from '@turnkit/agent-sdk';
import { makeAgent } from '@turnkit/agent-sdk/testing';
import { createHandoff, defaultHandoffDescription, handoffToolName } from '../handoff.js';

describe('handoffToolName', () => {
  it('lower-cases and joins whitespace runs with underscores', () => {
    expect(handoffToolName('Billing Agent')).toBe('transfer_to_billing_agent');
    expect(handoffToolName('Spanish   Tutor\tBot')).toBe('transfer_to_spanish_tutor_bot');
    expect(handoffToolName('math')).toBe('transfer_to_math');
  });
});

describe('createHandoff', () => {
  it('derives name and description from the target', () => {
    const handoff = createHandoff(makeAgent({ name: 'Spanish Agent' }));

    expect(handoff.toolName).toBe('transfer_to_spanish_agent');
    expect(handoff.description).toBe(defaultHandoffDescription('Spanish Agent'));
    expect(handoff.description).toBe('Handoff to the Spanish Agent agent to handle the request.');
    expect(handoff.parametersSchema).toEqual({ type: 'object', properties: {}, required: [] });
  });

  it('accepts overrides', () => {
    const handoff = createHandoff(makeAgent({ name: 'Billing' }), {
      toolName: 'escalate',
      description: 'Escalate to billing',
    });
    expect(handoff.toolName).toBe('escalate');
    expect(handoff.description).toBe('Escalate to billing');
  });

  it('returns the assistant marker', async () => {
    const handoff = createHandoff(makeAgent({ name: 'Billing' }));
    await expect(handoff.execute({})).resolves.toEqual({ assistant: 'Billing' });
  });

  it('resolves lazy targets on demand', () => {
    let target: AgentProfile | undefined;
    const handoff = createHandoff(() => {
      if (!target) {
        throw new Error('target not defined yet');
      }
      return target;
    });

    target = makeAgent({ name: 'Late' });

    expect(handoff.toolName).toBe('transfer_to_late');
    expect(handoff.targetAgent()).toBe(target);
  });
});
