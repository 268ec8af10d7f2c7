import { setImmediate as yieldToLoop } from 'node:timers/promises';
import { TransientIOError } from './errors.js';
import type { RunState } from './run_state.js';
import type { RunConfig } from './target.js';

/**
 * One probe channel per run, shared by its workers. `attempt` resolves when
 * the probe succeeds and rejects with `TransientIOError` when it does not.
 */
export interface IProbeChannel {
  attempt(signal: AbortSignal): Promise<void>;
  close(): Promise<void>;
}

export interface IProbeTransport {
  /** Throws when the channel cannot be set up; the run then fails before any worker starts. */
  open(config: RunConfig): Promise<IProbeChannel>;
}

/**
 * Runs attempts until the stop flag flips or the deadline passes. Transient
 * failures are counted, except attempts aborted by the stop itself; anything
 * else flips the stop flag and propagates.
 */
export async function runWorker(state: RunState, channel: IProbeChannel): Promise<void> {
  while (!state.stopRequested && !state.isPastDeadline()) {
    state.recordAttempt();
    try {
      await channel.attempt(state.signal);
      state.recordSuccess();
    } catch (error) {
      if (!(error instanceof TransientIOError)) {
        state.requestStop('fault');
        throw error;
      }
      // an attempt cut short by the stop flag is not a network failure
      if (!(error.ioCode === 'ABORTED' && state.stopRequested)) {
        state.recordFailure();
      }
    }

    // a channel that settles without real I/O must not starve timers
    await yieldToLoop();
  }
}
