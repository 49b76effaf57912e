import { describe, it, expect } from 'vitest';
import { ConfigError } from '@turnkit/agent-contracts';
import { makeAgent, makeTool } from '@turnkit/agent-sdk/testing';
import { ToolCatalog } from '../tool-catalog.js';
import { createHandoff } from '../../handoffs/handoff.js';

describe('ToolCatalog', () => {
  it('lists tools before handoffs, in declaration order', () => {
    const billing = makeAgent({ name: 'Billing' });
    const agent = makeAgent({
      tools: [makeTool('search'), makeTool('lookup')],
      handoffs: [createHandoff(billing)],
    });

    const catalog = new ToolCatalog(agent);

    expect(catalog.definitions().map((def) => def.name)).toEqual(['search', 'lookup', 'transfer_to_billing']);
    expect(catalog.size).toBe(3);
    expect(catalog.definitions()[2]).toEqual({
      name: 'transfer_to_billing',
      description: 'Handoff to the Billing agent to handle the request.',
      parameters: { type: 'object', properties: {}, required: [] },
    });
  });

  it('resolves tools and handoffs by name', () => {
    const target = makeAgent({ name: 'Support' });
    const search = makeTool('search');
    const catalog = new ToolCatalog(makeAgent({ tools: [search], handoffs: [createHandoff(target)] }));

    expect(catalog.resolve('search')).toEqual({ kind: 'tool', name: 'search', tool: search });
    expect(catalog.resolve('transfer_to_support')?.kind).toBe('handoff');
    expect(catalog.resolve('missing')).toBeUndefined();
  });

  it('is empty for an agent without tools', () => {
    const catalog = new ToolCatalog(makeAgent());
    expect(catalog.size).toBe(0);
    expect(catalog.definitions()).toEqual([]);
  });

  it('rejects duplicate tool names', () => {
    const agent = makeAgent({ name: 'dup', tools: [makeTool('search'), makeTool('search')] });
    expect(() => new ToolCatalog(agent)).toThrow(ConfigError);
    expect(() => new ToolCatalog(agent)).toThrow(
      'Configuration error: Tool name conflict: "search" is declared more than once by agent "dup"',
    );
  });

  it('rejects a handoff that shadows a tool', () => {
    const agent = makeAgent({
      tools: [makeTool('transfer_to_billing')],
      handoffs: [createHandoff(makeAgent({ name: 'Billing' }))],
    });
    expect(() => new ToolCatalog(agent)).toThrow(ConfigError);
  });
});
