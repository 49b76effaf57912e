/**
 * Stream events: what a streamed run (or a sync run's onEvent callback)
 * observes.
 *
 * Per turn, events appear in production order: text deltas first, then
 * message/tool items. A tool_called item always precedes its tool_output.
 */

import type { JsonObject } from '@turnkit/agent-contracts';
import type { AgentProfile } from './profile.js';

export type RunItemEventName =
  | 'message_output_created'
  | 'tool_called'
  | 'tool_output'
  | 'handoff_requested'
  | 'handoff_occurred';

export type RunItem =
  | { type: 'message_output'; content: string }
  | { type: 'tool_call'; callId: string; name: string; arguments: JsonObject }
  | { type: 'tool_output'; callId: string; name: string; output: string }
  | { type: 'handoff_requested'; agentName: string }
  | { type: 'handoff_occurred'; fromAgent: string; agentName: string };

export interface RawResponseEvent {
  type: 'raw_response_event';
  /** Text delta, or "Error: <message>" when the backend failed */
  data: string;
}

export interface RunItemStreamEvent {
  type: 'run_item_stream_event';
  name: RunItemEventName;
  item: RunItem;
}

export interface AgentUpdatedStreamEvent {
  type: 'agent_updated_stream_event';
  newAgent: AgentProfile;
}

export type StreamEvent = RawResponseEvent | RunItemStreamEvent | AgentUpdatedStreamEvent;

export type StreamEventType = StreamEvent['type'];
