/**
 * Handoffs: pseudo-tools that transfer control to another agent.
 *
 * Calling one returns `{ assistant: "<target name>" }`; the turn loop reads
 * that marker and swaps the current agent.
 */

import type { JsonValue, ToolInputSchema } from '@turnkit/agent-contracts';
import type { AgentProfile, Handoff } from '@turnkit/agent-sdk';

/** A target given directly, or lazily so agents can reference each other */
export type AgentRef = AgentProfile | (() => AgentProfile);

export interface HandoffOptions {
  toolName?: string;
  description?: string;
}

function emptyParameters(): ToolInputSchema {
  return { type: 'object', properties: {}, required: [] };
}

/** "Billing Agent" → "transfer_to_billing_agent" */
export function handoffToolName(agentName: string): string {
  return `transfer_to_${agentName.toLowerCase().replace(/\s+/g, '_')}`;
}

export function defaultHandoffDescription(agentName: string): string {
  return `Handoff to the ${agentName} agent to handle the request.`;
}

export function createHandoff(target: AgentRef, options: HandoffOptions = {}): Handoff {
  const resolve = typeof target === 'function' ? target : (): AgentProfile => target;

  return {
    // Getters: a lazy target may not exist yet when the handoff is declared
    get toolName(): string {
      return options.toolName ?? handoffToolName(resolve().name);
    },
    get description(): string {
      return options.description ?? defaultHandoffDescription(resolve().name);
    },
    parametersSchema: emptyParameters(),
    targetAgent: resolve,
    async execute(): Promise<JsonValue> {
      return { assistant: resolve().name };
    },
  };
}
