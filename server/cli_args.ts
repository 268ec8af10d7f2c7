import { ValidationError } from './errors.js';
import { parseTarget, type RunRequest } from './target.js';

export const USAGE =
  'Usage: bounded-probe <host:port> [--duration <seconds>] [--width <n>] [--timeout-ms <ms>] [--interval-ms <ms>]';

const FLAGS: Record<string, Exclude<keyof RunRequest, 'host' | 'port'>> = {
  '--duration': 'durationSeconds',
  '--width': 'width',
  '--timeout-ms': 'attemptTimeoutMs',
  '--interval-ms': 'reportIntervalMs',
};

/** Reads `host:port` and flag pairs; `--flag=value` is accepted too. */
export function parseCliArgs(argv: readonly string[]): RunRequest {
  let targetText: string | null = null;
  const request: Omit<RunRequest, 'host' | 'port'> = {};

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (!arg.startsWith('--')) {
      if (targetText !== null) throw new ValidationError(`Unexpected argument "${arg}"\n${USAGE}`);
      targetText = arg;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    const key = FLAGS[flag];
    if (!key) throw new ValidationError(`Unknown option ${flag}\n${USAGE}`);

    let raw: string | undefined;
    if (eq >= 0) {
      raw = arg.slice(eq + 1);
    } else {
      i += 1;
      raw = argv[i];
    }

    const value = Number(raw);
    if (raw === undefined || raw.trim() === '' || !Number.isFinite(value)) {
      throw new ValidationError(`Option ${flag} needs a numeric value\n${USAGE}`);
    }
    request[key] = value;
  }

  if (targetText === null) throw new ValidationError(`A target is required\n${USAGE}`);

  const target = parseTarget(targetText);
  if (!target) throw new ValidationError(`Target must look like host:port, got "${targetText}"\n${USAGE}`);

  return { ...target, ...request };
}
