/**
 * Tool: a capability the model can invoke by name.
 *
 * The runner never inspects a tool beyond this interface: the catalog reads
 * name/description/parametersSchema, the dispatcher calls execute().
 * Implementations must tolerate concurrent calls from separate runs.
 */

import type { JsonObject, JsonValue, ToolInputSchema } from '@turnkit/agent-contracts';

export interface Tool {
  /** Unique within the owning agent's catalog */
  readonly name: string;
  readonly description: string;
  /** JSON Schema the model fills in */
  readonly parametersSchema: ToolInputSchema;

  /**
   * Run the tool. Throwing fails the run with ToolExecutionFailedError
   * (unless the error already is an AgentError, which is propagated as-is).
   */
  execute(args: JsonObject): Promise<JsonValue>;

  /** Per-tool timeout in ms; overrides the run-level toolTimeoutMs. 0 = none */
  readonly timeoutMs?: number;
}
