import { advancePhase, type RunPhase, type TerminalPhase } from './control/run_lifecycle.js';
import type { RunConfig } from './target.js';

export type StopReason = 'requested' | 'deadline' | 'fault';

export type Clock = () => number;

export interface ProgressSnapshot {
  readonly runId: string;
  readonly attempts: number;
  readonly successes: number;
  readonly failures: number;
  readonly elapsedSeconds: number;
  /** attempts per second over the elapsed time */
  readonly rate: number;
  /** elapsed / configured duration, clamped to 0..1 */
  readonly progress: number;
  readonly phase: RunPhase;
  readonly final: boolean;
}

export interface FinalReport {
  readonly runId: string;
  readonly target: string;
  readonly attempts: number;
  readonly successes: number;
  readonly failures: number;
  readonly elapsedSeconds: number;
  readonly rate: number;
  readonly endState: TerminalPhase;
  readonly error: string | null;
}

const END_STATE: Record<StopReason, TerminalPhase> = {
  requested: 'stopped',
  deadline: 'completed',
  fault: 'failed',
};

/**
 * Counters and stop flag for one run. Shared by reference between the workers
 * and the reporter; counters only grow and the stop flag flips once.
 */
export class RunState {
  private attemptCount = 0;
  private successCount = 0;
  private failureCount = 0;
  private currentPhase: RunPhase = 'idle';
  private startedAtMs: number | null = null;
  private stoppedAtMs: number | null = null;
  private reason: StopReason | null = null;
  private readonly abort = new AbortController();

  constructor(
    public readonly runId: string,
    public readonly config: RunConfig,
    private readonly clock: Clock = Date.now,
  ) {}

  public get attempts(): number {
    return this.attemptCount;
  }

  public get successes(): number {
    return this.successCount;
  }

  public get failures(): number {
    return this.failureCount;
  }

  public get phase(): RunPhase {
    return this.currentPhase;
  }

  public get stopRequested(): boolean {
    return this.reason !== null;
  }

  public get stopReason(): StopReason | null {
    return this.reason;
  }

  /** Aborted when the stop flag flips, so in-flight attempts can bail out. */
  public get signal(): AbortSignal {
    return this.abort.signal;
  }

  public get deadlineMs(): number {
    return (this.startedAtMs ?? this.clock()) + this.config.durationSeconds * 1000;
  }

  public begin(): void {
    this.currentPhase = advancePhase(this.currentPhase, 'running');
    this.startedAtMs = this.clock();
  }

  public recordAttempt(): void {
    this.attemptCount += 1;
  }

  public recordSuccess(): void {
    this.successCount += 1;
  }

  public recordFailure(): void {
    this.failureCount += 1;
  }

  public isPastDeadline(): boolean {
    return this.startedAtMs !== null && this.clock() >= this.deadlineMs;
  }

  /**
   * Flips the stop flag. Returns false when it had already flipped.
   * A stop requested once the deadline has passed counts as the deadline.
   */
  public requestStop(reason: StopReason): boolean {
    if (this.reason !== null) return false;

    const now = this.clock();
    const pastDeadline = this.startedAtMs !== null && now >= this.deadlineMs;
    if (reason === 'requested' && pastDeadline) {
      reason = 'deadline';
    }

    this.reason = reason;
    // a run that reached its deadline ran for exactly its configured duration
    this.stoppedAtMs = reason === 'deadline' && this.startedAtMs !== null ? this.deadlineMs : now;
    this.abort.abort();
    return true;
  }

  /** Moves the run into the terminal phase matching its stop reason. */
  public settle(): TerminalPhase {
    const reason = this.reason ?? 'deadline';
    const terminal = END_STATE[reason];
    this.currentPhase = advancePhase(this.currentPhase, terminal);
    return terminal;
  }

  /** Setup failed before any worker ran. */
  public fail(): void {
    if (this.reason === null) {
      this.reason = 'fault';
      this.stoppedAtMs = this.clock();
      this.abort.abort();
    }
    this.currentPhase = advancePhase(this.currentPhase, 'failed');
  }

  public elapsedSeconds(): number {
    if (this.startedAtMs === null) return 0;
    const end = this.stoppedAtMs ?? this.clock();
    return Math.max(0, end - this.startedAtMs) / 1000;
  }

  public snapshot(final = false): ProgressSnapshot {
    const elapsedSeconds = this.elapsedSeconds();
    return Object.freeze({
      runId: this.runId,
      attempts: this.attemptCount,
      successes: this.successCount,
      failures: this.failureCount,
      elapsedSeconds,
      rate: elapsedSeconds > 0 ? this.attemptCount / elapsedSeconds : 0,
      progress: Math.min(1, elapsedSeconds / this.config.durationSeconds),
      phase: this.currentPhase,
      final,
    });
  }
}
