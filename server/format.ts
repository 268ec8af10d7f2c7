import type { FinalReport, ProgressSnapshot } from './run_state.js';

const countFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

export function formatCount(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  return countFormat.format(Math.trunc(value));
}

export function formatRate(rate: number): string {
  return `${rate.toFixed(2)}/s`;
}

export function formatSnapshot(snapshot: ProgressSnapshot): string {
  const percent = (snapshot.progress * 100).toFixed(1);
  return [
    `run=${snapshot.runId}`,
    `progress=${percent}%`,
    `attempts=${formatCount(snapshot.attempts)}`,
    `ok=${formatCount(snapshot.successes)}`,
    `failed=${formatCount(snapshot.failures)}`,
    `rate=${formatRate(snapshot.rate)}`,
    `elapsed=${snapshot.elapsedSeconds.toFixed(1)}s`,
  ].join(' ');
}

export function formatReport(report: FinalReport): string {
  const parts = [
    `run=${report.runId}`,
    `target=${report.target}`,
    `end=${report.endState}`,
    `attempts=${formatCount(report.attempts)}`,
    `ok=${formatCount(report.successes)}`,
    `failed=${formatCount(report.failures)}`,
    `rate=${formatRate(report.rate)}`,
    `elapsed=${report.elapsedSeconds.toFixed(2)}s`,
  ];
  if (report.error) parts.push(`error="${report.error}"`);
  return parts.join(' ');
}
