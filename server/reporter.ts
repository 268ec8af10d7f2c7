import { errorMessage } from './errors.js';
import type { ProgressSnapshot, RunState } from './run_state.js';

export type SnapshotListener = (snapshot: ProgressSnapshot) => void | Promise<void>;

export class Reporter {
  private timer: NodeJS.Timeout | null = null;
  private finalSnapshot: ProgressSnapshot | null = null;
  private readonly listeners = new Set<SnapshotListener>();

  constructor(
    private readonly state: RunState,
    private readonly intervalMs: number,
  ) {}

  public subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public start(): void {
    if (this.timer || this.finalSnapshot) return;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
  }

  /** Cancels the interval and delivers the final snapshot, once. */
  public finish(): ProgressSnapshot {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    if (!this.finalSnapshot) {
      this.finalSnapshot = this.state.snapshot(true);
      this.deliver(this.finalSnapshot);
      this.listeners.clear();
    }

    return this.finalSnapshot;
  }

  private tick(): void {
    if (this.state.stopRequested) return;
    this.deliver(this.state.snapshot(false));
  }

  private deliver(snapshot: ProgressSnapshot): void {
    for (const listener of [...this.listeners]) {
      try {
        const pending: unknown = listener(snapshot);
        if (pending instanceof Promise) {
          pending.catch((error: unknown) => {
            console.error(`[reporter] subscriber failed for run ${snapshot.runId}:`, errorMessage(error));
          });
        }
      } catch (error) {
        console.error(`[reporter] subscriber failed for run ${snapshot.runId}:`, errorMessage(error));
      }
    }
  }
}
