export interface ProbeSettings {
  maxDurationSeconds: number;
  maxWidth: number;
  defaultDurationSeconds: number;
  defaultWidth: number;
  attemptTimeoutMs: number;
  reportIntervalMs: number;
  /** finished runs kept for status queries; older ones are forgotten */
  retainedRuns: number;
}

/** Largest delay Node timers accept; anything above fires after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

export interface ServerSettings extends ProbeSettings {
  host: string;
  port: number;
}

export const DEFAULT_SETTINGS: Readonly<ServerSettings> = Object.freeze({
  maxDurationSeconds: 300,
  maxWidth: 100,
  defaultDurationSeconds: 10,
  defaultWidth: 4,
  attemptTimeoutMs: 1500,
  reportIntervalMs: 5000,
  retainedRuns: 50,
  host: '127.0.0.1',
  port: 3000,
});

function positiveNumber(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  if (!raw || !Number.isFinite(value) || value <= 0) return fallback;
  return value;
}

function positiveInteger(raw: string | undefined, fallback: number): number {
  const value = positiveNumber(raw, fallback);
  return Number.isInteger(value) ? value : fallback;
}

function timerMs(raw: string | undefined, fallback: number): number {
  const value = positiveInteger(raw, fallback);
  return value <= MAX_TIMER_MS ? value : fallback;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): ServerSettings {
  const maxWidth = positiveInteger(env.PROBE_MAX_WIDTH, DEFAULT_SETTINGS.maxWidth);
  const maxDurationSeconds = positiveNumber(env.PROBE_MAX_DURATION_SECONDS, DEFAULT_SETTINGS.maxDurationSeconds);

  return {
    maxDurationSeconds,
    maxWidth,
    defaultDurationSeconds: Math.min(
      positiveNumber(env.PROBE_DEFAULT_DURATION_SECONDS, DEFAULT_SETTINGS.defaultDurationSeconds),
      maxDurationSeconds,
    ),
    defaultWidth: Math.min(positiveInteger(env.PROBE_DEFAULT_WIDTH, DEFAULT_SETTINGS.defaultWidth), maxWidth),
    attemptTimeoutMs: timerMs(env.PROBE_ATTEMPT_TIMEOUT_MS, DEFAULT_SETTINGS.attemptTimeoutMs),
    reportIntervalMs: timerMs(env.PROBE_REPORT_INTERVAL_MS, DEFAULT_SETTINGS.reportIntervalMs),
    retainedRuns: positiveInteger(env.PROBE_RETAINED_RUNS, DEFAULT_SETTINGS.retainedRuns),
    host: env.HOST?.trim() || DEFAULT_SETTINGS.host,
    port: Number.parseInt(env.PORT ?? String(DEFAULT_SETTINGS.port), 10) || DEFAULT_SETTINGS.port,
  };
}
