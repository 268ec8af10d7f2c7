import assert from 'node:assert/strict';
import { setTimeout as delay } from 'node:timers/promises';
import { Reporter } from '../../server/reporter.js';
import { RunState, type ProgressSnapshot } from '../../server/run_state.js';
import { testConfig } from './fakes.js';

function runningState(): RunState {
  const state = new RunState('reporter-run', testConfig({ durationSeconds: 10 }));
  state.begin();
  return state;
}

async function testPeriodicThenFinal(): Promise<void> {
  const state = runningState();
  const reporter = new Reporter(state, 20);
  const seen: ProgressSnapshot[] = [];
  reporter.subscribe((snapshot) => {
    seen.push(snapshot);
  });

  reporter.start();
  state.recordAttempt();
  state.recordSuccess();
  await delay(110);

  const ticks = seen.length;
  assert.ok(ticks >= 2, `expected periodic snapshots, got ${ticks}`);
  assert.ok(seen.every((snapshot) => !snapshot.final));

  state.requestStop('requested');
  await delay(60);
  assert.equal(seen.length, ticks, 'no periodic snapshots after the stop flag flips');

  const final = reporter.finish();
  assert.equal(final.final, true);
  assert.equal(seen.length, ticks + 1);
  assert.equal(seen[seen.length - 1], final);

  assert.equal(reporter.finish(), final);
  assert.equal(seen.length, ticks + 1);

  for (const snapshot of seen) {
    assert.ok(snapshot.attempts >= snapshot.successes);
  }
}

async function testSubscriberFailuresAreIsolated(): Promise<void> {
  const state = runningState();
  const reporter = new Reporter(state, 1_000);
  const received: string[] = [];

  reporter.subscribe(() => {
    throw new Error('listener exploded');
  });
  reporter.subscribe(async () => {
    throw new Error('listener rejected');
  });
  reporter.subscribe((snapshot) => {
    received.push(snapshot.runId);
  });

  state.requestStop('requested');
  reporter.finish();
  await delay(5);

  assert.deepEqual(received, ['reporter-run']);
}

async function testUnsubscribe(): Promise<void> {
  const state = runningState();
  const reporter = new Reporter(state, 15);
  let calls = 0;
  const unsubscribe = reporter.subscribe(() => {
    calls += 1;
  });

  unsubscribe();
  reporter.start();
  await delay(50);
  state.requestStop('requested');
  reporter.finish();

  assert.equal(calls, 0);
}

async function main(): Promise<void> {
  await testPeriodicThenFinal();
  await testSubscriberFailuresAreIsolated();
  await testUnsubscribe();
  console.log('[reporter_contract] PASS');
}

main().catch((error) => {
  console.error('[reporter_contract] FAIL', error);
  process.exitCode = 1;
});
