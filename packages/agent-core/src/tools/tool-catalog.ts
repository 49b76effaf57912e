/**
 * ToolCatalog: name → capability map for the current agent.
 *
 * Built from an AgentProfile's tools followed by its handoffs. Rebuilt
 * wholesale on every handoff; never patched in place.
 */

import { ConfigError, type ToolDefinition } from '@turnkit/agent-contracts';
import type { AgentProfile, Handoff, Tool } from '@turnkit/agent-sdk';

export type CatalogEntry =
  | { kind: 'tool'; name: string; tool: Tool }
  | { kind: 'handoff'; name: string; handoff: Handoff };

export class ToolCatalog {
  private readonly tools = new Map<string, Tool>();
  private readonly handoffs = new Map<string, Handoff>();
  private readonly defs: ToolDefinition[] = [];

  /**
   * @throws ConfigError on a duplicate name (tool/tool, tool/handoff or
   *   handoff/handoff)
   */
  constructor(private readonly agent: AgentProfile) {
    for (const tool of agent.tools) {
      this.assertFree(tool.name);
      this.tools.set(tool.name, tool);
      this.defs.push({ name: tool.name, description: tool.description, parameters: tool.parametersSchema });
    }
    for (const handoff of agent.handoffs) {
      this.assertFree(handoff.toolName);
      this.handoffs.set(handoff.toolName, handoff);
      this.defs.push({
        name: handoff.toolName,
        description: handoff.description,
        parameters: handoff.parametersSchema,
      });
    }
  }

  get size(): number {
    return this.defs.length;
  }

  /** Definitions in declaration order: tools, then handoffs */
  definitions(): ToolDefinition[] {
    return this.defs.map((def) => ({ ...def }));
  }

  has(name: string): boolean {
    return this.tools.has(name) || this.handoffs.has(name);
  }

  /** Ordinary tools win over handoffs */
  resolve(name: string): CatalogEntry | undefined {
    const tool = this.tools.get(name);
    if (tool) {
      return { kind: 'tool', name, tool };
    }
    const handoff = this.handoffs.get(name);
    if (handoff) {
      return { kind: 'handoff', name, handoff };
    }
    return undefined;
  }

  private assertFree(name: string): void {
    if (this.has(name)) {
      throw new ConfigError(`Tool name conflict: "${name}" is declared more than once by agent "${this.agent.name}"`);
    }
  }
}
