/**
 * What a completed run returns.
 */

import type { z } from 'zod';
import {
  ModelBehaviorError,
  formatZodIssues,
  type JsonValue,
} from '@turnkit/agent-contracts';
import type { AgentProfile } from '@turnkit/agent-sdk';

export class RunResult {
  constructor(
    /** Assistant text of the terminal response (after output guardrails) */
    readonly finalOutput: string,
    /** Agent current when the run ended */
    readonly lastAgent: AgentProfile,
    /** Backend calls made */
    readonly turns: number,
    /** Parsed final output, when the last agent declared an output schema */
    readonly structuredOutput?: JsonValue,
  ) {}

  /**
   * Validate the final output with a zod schema.
   * Uses the structured output when present, else the final text parsed as
   * JSON, else the raw text.
   * @throws ModelBehaviorError when the value does not match
   */
  finalOutputAs<S extends z.ZodTypeAny>(schema: S): z.output<S> {
    const source = this.structuredOutput !== undefined ? this.structuredOutput : parseOrRaw(this.finalOutput);
    const result = schema.safeParse(source);
    if (!result.success) {
      throw new ModelBehaviorError(`Final output does not match schema:\n${formatZodIssues(result.error)}`, result.error);
    }
    return result.data;
  }

  toString(): string {
    return this.finalOutput;
  }
}

function parseOrRaw(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return text;
  }
}
