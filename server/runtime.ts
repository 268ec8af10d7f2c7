import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import { TcpConnectTransport } from './adapters/tcp_transport.js';
import { DEFAULT_SETTINGS, type ProbeSettings } from './config.js';
import type { RunPhase, TerminalPhase } from './control/run_lifecycle.js';
import { SetupError, errorMessage } from './errors.js';
import { formatReport } from './format.js';
import { Reporter, type SnapshotListener } from './reporter.js';
import { RunState, type Clock, type FinalReport, type ProgressSnapshot } from './run_state.js';
import { dnsResolver, formatTarget, resolveRunConfig, type HostResolver, type RunConfig, type RunRequest } from './target.js';
import { runWorker, type IProbeChannel, type IProbeTransport } from './worker.js';

export interface RunHandle {
  readonly id: string;
  readonly config: RunConfig;
}

export interface RunSummary {
  id: string;
  target: string;
  config: RunConfig;
  phase: RunPhase;
  snapshot: ProgressSnapshot;
  report: FinalReport | null;
}

export interface RuntimeOptions {
  settings?: ProbeSettings;
  transport?: IProbeTransport;
  resolveHost?: HostResolver;
  clock?: Clock;
  createId?: () => string;
}

interface TrackedRun {
  handle: RunHandle;
  /** released once the run has settled */
  state: RunState | null;
  reporter: Reporter | null;
  lastSnapshot: ProgressSnapshot;
  completion: Promise<FinalReport>;
  report: FinalReport | null;
}

type RunRef = RunHandle | string;

function refId(ref: RunRef): string {
  return typeof ref === 'string' ? ref : ref.id;
}

function buildReport(state: RunState, endState: TerminalPhase, error: string | null): FinalReport {
  const snapshot = state.snapshot(true);
  return Object.freeze({
    runId: state.runId,
    target: formatTarget(state.config),
    attempts: snapshot.attempts,
    successes: snapshot.successes,
    failures: snapshot.failures,
    elapsedSeconds: snapshot.elapsedSeconds,
    rate: snapshot.rate,
    endState,
    error,
  });
}

/**
 * Starts and supervises probe runs. Emits `progress` with every snapshot and
 * `report` with every final report.
 */
export class ProbeRuntime extends EventEmitter {
  private readonly settings: ProbeSettings;
  private readonly transport: IProbeTransport;
  private readonly resolveHost: HostResolver;
  private readonly clock: Clock;
  private readonly createId: () => string;
  private readonly runs = new Map<string, TrackedRun>();
  /** ids of finished runs, earliest-finished first */
  private readonly finished: string[] = [];

  constructor(options: RuntimeOptions = {}) {
    super();
    this.settings = options.settings ?? DEFAULT_SETTINGS;
    this.transport = options.transport ?? new TcpConnectTransport();
    this.resolveHost = options.resolveHost ?? dnsResolver;
    this.clock = options.clock ?? Date.now;
    this.createId = options.createId ?? randomUUID;
  }

  public get limits(): ProbeSettings {
    return { ...this.settings };
  }

  /**
   * Validates the request, opens the probe channel and spawns the workers.
   * Resolves as soon as the run is going; it does not wait for the run to end.
   */
  public async start(request: RunRequest): Promise<RunHandle> {
    const config = await resolveRunConfig(request, this.settings, this.resolveHost);
    const id = this.createId();
    const handle: RunHandle = Object.freeze({ id, config });
    const state = new RunState(id, config, this.clock);

    let channel: IProbeChannel;
    try {
      channel = await this.transport.open(config);
    } catch (error) {
      const message = error instanceof SetupError ? error.message : `Could not open probe channel: ${errorMessage(error)}`;
      const failure = new SetupError(message, error, id);
      state.fail();
      const report = buildReport(state, 'failed', failure.message);
      this.runs.set(id, {
        handle,
        state: null,
        reporter: null,
        lastSnapshot: state.snapshot(true),
        completion: Promise.resolve(report),
        report,
      });
      this.retire(id);
      console.error(`[runtime] run ${id} failed during setup: ${failure.message}`);
      this.emit('report', report);
      throw failure;
    }

    const reporter = new Reporter(state, config.reportIntervalMs);
    reporter.subscribe((snapshot) => {
      const tracked = this.runs.get(id);
      if (tracked) tracked.lastSnapshot = snapshot;
      this.emit('progress', snapshot);
    });

    state.begin();
    reporter.start();
    const deadlineTimer = setTimeout(() => {
      state.requestStop('deadline');
    }, config.durationSeconds * 1000);

    const workers = Array.from({ length: config.width }, () => runWorker(state, channel));
    const completion = this.drain(id, state, reporter, channel, workers, deadlineTimer);
    completion.catch((error: unknown) => {
      console.error(`[runtime] run ${id} could not settle:`, errorMessage(error));
    });
    this.runs.set(id, {
      handle,
      state,
      reporter,
      lastSnapshot: state.snapshot(),
      completion,
      report: null,
    });

    console.log(
      `[runtime] run ${id} started: ${formatTarget(config)} width=${config.width} duration=${config.durationSeconds}s`,
    );
    return handle;
  }

  /** Flips the stop flag of a run. Unknown and finished runs are ignored. */
  public stop(ref: RunRef): void {
    const run = this.runs.get(refId(ref));
    if (!run?.state) return;
    if (run.state.requestStop('requested')) {
      console.log(`[runtime] stop requested for run ${run.handle.id}`);
    }
  }

  public stopAll(): void {
    for (const run of this.runs.values()) {
      this.stop(run.handle);
    }
  }

  public subscribe(ref: RunRef, listener: SnapshotListener): () => void {
    const run = this.requireRun(ref);
    if (!run.reporter) return () => {};
    return run.reporter.subscribe(listener);
  }

  public awaitCompletion(ref: RunRef): Promise<FinalReport> {
    const run = this.runs.get(refId(ref));
    if (!run) return Promise.reject(new Error(`Unknown run ${refId(ref)}`));
    return run.completion;
  }

  public getRun(ref: RunRef): RunSummary | null {
    const run = this.runs.get(refId(ref));
    return run ? this.summarize(run) : null;
  }

  public listRuns(): RunSummary[] {
    return [...this.runs.values()].map((run) => this.summarize(run));
  }

  public activeRunCount(): number {
    let count = 0;
    for (const run of this.runs.values()) {
      if (run.state) count += 1;
    }
    return count;
  }

  private requireRun(ref: RunRef): TrackedRun {
    const run = this.runs.get(refId(ref));
    if (!run) throw new Error(`Unknown run ${refId(ref)}`);
    return run;
  }

  /** Queues a finished run and forgets the earliest-finished ones beyond `retainedRuns`. */
  private retire(id: string): void {
    this.finished.push(id);
    while (this.finished.length > this.settings.retainedRuns) {
      const oldest = this.finished.shift();
      if (oldest !== undefined) this.runs.delete(oldest);
    }
  }

  private summarize(run: TrackedRun): RunSummary {
    const snapshot = run.state ? run.state.snapshot() : run.lastSnapshot;
    return {
      id: run.handle.id,
      target: formatTarget(run.handle.config),
      config: run.handle.config,
      phase: snapshot.phase,
      snapshot,
      report: run.report,
    };
  }

  private async drain(
    id: string,
    state: RunState,
    reporter: Reporter,
    channel: IProbeChannel,
    workers: Promise<void>[],
    deadlineTimer: NodeJS.Timeout,
  ): Promise<FinalReport> {
    const results = await Promise.allSettled(workers);
    clearTimeout(deadlineTimer);
    // workers may exit on the clock before the timer fires
    state.requestStop('deadline');

    const fault = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (fault) {
      console.error(`[runtime] run ${id} worker fault:`, errorMessage(fault.reason));
    }

    try {
      await channel.close();
    } catch (error) {
      console.error(`[runtime] run ${id} channel close failed:`, errorMessage(error));
    }

    const endState = state.settle();
    const finalSnapshot = reporter.finish();
    const report = buildReport(state, endState, fault ? errorMessage(fault.reason) : null);

    const run = this.runs.get(id);
    if (run) {
      run.lastSnapshot = finalSnapshot;
      run.report = report;
      run.state = null;
      run.reporter = null;
    }
    this.retire(id);

    console.log(`[runtime] ${formatReport(report)}`);
    this.emit('report', report);
    return report;
  }
}
