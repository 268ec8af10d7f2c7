import assert from 'node:assert/strict';
import { formatCount, formatRate, formatReport, formatSnapshot } from '../../server/format.js';

function testCounts(): void {
  assert.equal(formatCount(0), '0');
  assert.equal(formatCount(1234567), '1,234,567');
  assert.equal(formatCount(999.9), '999');
  assert.equal(formatCount(Number.NaN), 'NaN');
  assert.equal(formatRate(12.5), '12.50/s');
}

function testSnapshotLine(): void {
  const line = formatSnapshot({
    runId: 'run-1',
    attempts: 12500,
    successes: 12000,
    failures: 500,
    elapsedSeconds: 2.5,
    rate: 5000,
    progress: 0.25,
    phase: 'running',
    final: false,
  });
  assert.equal(line, 'run=run-1 progress=25.0% attempts=12,500 ok=12,000 failed=500 rate=5000.00/s elapsed=2.5s');
}

function testReportLine(): void {
  const base = {
    runId: 'run-2',
    target: '127.0.0.1:9',
    attempts: 40,
    successes: 0,
    failures: 40,
    elapsedSeconds: 2,
    rate: 20,
    endState: 'completed' as const,
    error: null,
  };
  assert.equal(
    formatReport(base),
    'run=run-2 target=127.0.0.1:9 end=completed attempts=40 ok=0 failed=40 rate=20.00/s elapsed=2.00s',
  );
  assert.equal(
    formatReport({ ...base, endState: 'failed', error: 'channel broke' }),
    'run=run-2 target=127.0.0.1:9 end=failed attempts=40 ok=0 failed=40 rate=20.00/s elapsed=2.00s error="channel broke"',
  );
}

function main(): void {
  testCounts();
  testSnapshotLine();
  testReportLine();
  console.log('[format_contract] PASS');
}

main();
