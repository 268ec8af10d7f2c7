import { lookup } from 'node:dns/promises';
import { MAX_TIMER_MS, type ProbeSettings } from './config.js';
import { addressFamily, isPermittedAddress } from './control/address_policy.js';
import { ValidationError, errorMessage } from './errors.js';

export interface ProbeTarget {
  host: string;
  port: number;
}

export interface RunRequest {
  host: string;
  port: number;
  durationSeconds?: number;
  width?: number;
  attemptTimeoutMs?: number;
  reportIntervalMs?: number;
}

export interface RunConfig {
  readonly host: string;
  readonly address: string;
  readonly port: number;
  readonly durationSeconds: number;
  readonly width: number;
  readonly attemptTimeoutMs: number;
  readonly reportIntervalMs: number;
}

export type HostResolver = (host: string) => Promise<string[]>;

export const dnsResolver: HostResolver = async (host) => {
  const records = await lookup(host, { all: true, verbatim: true });
  return records.map((record) => record.address);
};

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

/**
 * Parses `host:port`, `[v6]:port`. Returns null when the text is not in that shape.
 */
export function parseTarget(text: string): ProbeTarget | null {
  const raw = text.trim();
  if (!raw) return null;

  let host: string;
  let portText: string;

  const bracketed = /^\[([^\]]+)\]:(\d+)$/.exec(raw);
  if (bracketed) {
    host = bracketed[1];
    portText = bracketed[2];
  } else {
    const idx = raw.lastIndexOf(':');
    if (idx <= 0) return null;
    host = raw.slice(0, idx);
    portText = raw.slice(idx + 1);
    // an unbracketed IPv6 literal is ambiguous
    if (host.includes(':')) return null;
  }

  if (!/^\d+$/.test(portText)) return null;
  const port = Number.parseInt(portText, 10);
  if (!isValidPort(port)) return null;
  if (!/^[A-Za-z0-9.:_-]+$/.test(host)) return null;

  return { host, port };
}

export function formatTarget(target: ProbeTarget): string {
  return addressFamily(target.host) === 'ipv6' ? `[${target.host}]:${target.port}` : `${target.host}:${target.port}`;
}

async function resolvePermittedAddress(host: string, resolve: HostResolver): Promise<string> {
  if (addressFamily(host)) {
    if (!isPermittedAddress(host)) {
      throw new ValidationError(`Target ${host} is outside the permitted private/loopback/reserved ranges`);
    }
    return host;
  }

  let addresses: string[];
  try {
    addresses = await resolve(host);
  } catch (error) {
    throw new ValidationError(`Target host ${host} could not be resolved: ${errorMessage(error)}`);
  }

  if (addresses.length === 0) {
    throw new ValidationError(`Target host ${host} resolved to no addresses`);
  }

  const rejected = addresses.filter((address) => !isPermittedAddress(address));
  if (rejected.length > 0) {
    throw new ValidationError(
      `Target host ${host} resolves to ${rejected.join(', ')}, outside the permitted private/loopback/reserved ranges`,
    );
  }

  return addresses[0];
}

export async function resolveRunConfig(
  request: RunRequest,
  settings: ProbeSettings,
  resolve: HostResolver = dnsResolver,
): Promise<RunConfig> {
  const host = request.host.trim();
  if (!host) throw new ValidationError('Target host is required');
  if (!isValidPort(request.port)) throw new ValidationError(`Invalid port: ${request.port}`);

  const requestedDuration = request.durationSeconds ?? settings.defaultDurationSeconds;
  if (!Number.isFinite(requestedDuration) || requestedDuration <= 0) {
    throw new ValidationError(`Duration must be a positive number of seconds, got ${requestedDuration}`);
  }

  const width = request.width ?? settings.defaultWidth;
  if (!Number.isInteger(width) || width <= 0) {
    throw new ValidationError(`Width must be a positive integer, got ${width}`);
  }
  if (width > settings.maxWidth) {
    throw new ValidationError(`Width ${width} exceeds the maximum of ${settings.maxWidth}`);
  }

  const attemptTimeoutMs = request.attemptTimeoutMs ?? settings.attemptTimeoutMs;
  if (!Number.isFinite(attemptTimeoutMs) || attemptTimeoutMs <= 0) {
    throw new ValidationError(`Attempt timeout must be positive, got ${attemptTimeoutMs}`);
  }
  if (attemptTimeoutMs > MAX_TIMER_MS) {
    throw new ValidationError(`Attempt timeout ${attemptTimeoutMs}ms exceeds the maximum of ${MAX_TIMER_MS}ms`);
  }

  const reportIntervalMs = request.reportIntervalMs ?? settings.reportIntervalMs;
  if (!Number.isFinite(reportIntervalMs) || reportIntervalMs <= 0) {
    throw new ValidationError(`Report interval must be positive, got ${reportIntervalMs}`);
  }
  if (reportIntervalMs > MAX_TIMER_MS) {
    throw new ValidationError(`Report interval ${reportIntervalMs}ms exceeds the maximum of ${MAX_TIMER_MS}ms`);
  }

  const address = await resolvePermittedAddress(host, resolve);

  return Object.freeze({
    host,
    address,
    port: request.port,
    durationSeconds: Math.min(requestedDuration, settings.maxDurationSeconds),
    width,
    attemptTimeoutMs,
    reportIntervalMs,
  });
}
