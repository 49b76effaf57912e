/**
 * StreamedRunResult: handle on a run executing in the background.
 *
 *   producer (TurnLoop) ──write──▶ EventChannel ──▶ streamEvents()
 *          └── settles the result slot only after closing the channel
 *
 * streamEvents() may be consumed once. Leaving the iteration early, or
 * calling cancel(), aborts the run. finalResult() reports whatever the run
 * settled with: RunCancelledError if it stopped at an abort check, the
 * result if it had already finished.
 */

import { UserError } from '@turnkit/agent-contracts';
import type { AgentProfile, StreamEvent } from '@turnkit/agent-sdk';
import type { RunResult } from '../result.js';
import type { EventChannel } from './event-channel.js';

export type RunOutcome = { ok: true; result: RunResult } | { ok: false; error: unknown };

export class StreamedRunResult {
  private consumed = false;

  constructor(
    private readonly channel: EventChannel<StreamEvent>,
    /** Settles after the channel is closed */
    private readonly outcome: Promise<RunOutcome>,
    private readonly controller: AbortController,
    private readonly agentRef: () => AgentProfile,
  ) {}

  /** Agent in control as of the last emitted agent_updated event */
  get currentAgent(): AgentProfile {
    return this.agentRef();
  }

  /** True once the producer has closed the event channel */
  get isComplete(): boolean {
    return this.channel.isClosed;
  }

  /**
   * Events in production order.
   * @throws UserError on a second call
   */
  streamEvents(): AsyncIterable<StreamEvent> {
    this.claim();
    return this.iterate();
  }

  /**
   * Drains unread events, then waits for the run to settle.
   * Rejects with the run's first error.
   */
  async finalResult(): Promise<RunResult> {
    if (!this.consumed) {
      this.consumed = true;
      await this.drain();
    }
    const outcome = await this.outcome;
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.result;
  }

  /** Abort the run; it stops at its next cancellation check. No-op once it has finished */
  cancel(): void {
    if (this.channel.isClosed) {
      return;
    }
    this.controller.abort();
  }

  private claim(): void {
    if (this.consumed) {
      throw new UserError('streamEvents() can only be consumed once');
    }
    this.consumed = true;
  }

  private async *iterate(): AsyncGenerator<StreamEvent, void, undefined> {
    let finished = false;
    try {
      for await (const event of this.channel) {
        yield event;
      }
      finished = true;
    } finally {
      if (!finished) {
        this.cancel();
        this.channel.discard();
      }
    }
  }

  private async drain(): Promise<void> {
    let next = await this.channel.read();
    while (!next.done) {
      next = await this.channel.read();
    }
  }
}
