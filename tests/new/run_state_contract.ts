import assert from 'node:assert/strict';
import { LifecycleError } from '../../server/errors.js';
import { RunState } from '../../server/run_state.js';
import { testConfig } from './fakes.js';

function fakeClock(start: number): { now: () => number; set: (value: number) => void } {
  let current = start;
  return {
    now: () => current,
    set: (value: number) => {
      current = value;
    },
  };
}

function testCountersAndSnapshot(): void {
  const clock = fakeClock(1_000);
  const state = new RunState('run-1', testConfig({ durationSeconds: 4 }), clock.now);
  state.begin();
  assert.equal(state.phase, 'running');
  assert.equal(state.deadlineMs, 5_000);

  state.recordAttempt();
  state.recordSuccess();
  state.recordAttempt();
  state.recordSuccess();
  state.recordAttempt();
  state.recordFailure();
  clock.set(2_000);

  const snapshot = state.snapshot();
  assert.deepEqual(snapshot, {
    runId: 'run-1',
    attempts: 3,
    successes: 2,
    failures: 1,
    elapsedSeconds: 1,
    rate: 3,
    progress: 0.25,
    phase: 'running',
    final: false,
  });
  assert.equal(Object.isFrozen(snapshot), true);

  state.recordAttempt();
  assert.equal(snapshot.attempts, 3);
}

function testStopFlipsOnce(): void {
  const clock = fakeClock(1_000);
  const state = new RunState('run-2', testConfig({ durationSeconds: 10 }), clock.now);
  state.begin();

  clock.set(1_500);
  assert.equal(state.requestStop('requested'), true);
  assert.equal(state.signal.aborted, true);

  clock.set(3_000);
  assert.equal(state.requestStop('requested'), false);
  assert.equal(state.requestStop('deadline'), false);
  assert.equal(state.stopReason, 'requested');
  assert.equal(state.elapsedSeconds(), 0.5);

  assert.equal(state.settle(), 'stopped');
  assert.equal(state.phase, 'stopped');
  assert.throws(() => state.settle(), LifecycleError);
}

function testStopAfterDeadlineCountsAsCompleted(): void {
  const clock = fakeClock(1_000);
  const state = new RunState('run-3', testConfig({ durationSeconds: 2 }), clock.now);
  state.begin();

  clock.set(3_500);
  assert.equal(state.isPastDeadline(), true);
  state.requestStop('requested');
  assert.equal(state.stopReason, 'deadline');
  assert.equal(state.elapsedSeconds(), 2);
  assert.equal(state.snapshot(true).progress, 1);
  assert.equal(state.settle(), 'completed');
}

function testFaultSettlesAsFailed(): void {
  const state = new RunState('run-4', testConfig());
  state.begin();
  state.requestStop('fault');
  assert.equal(state.settle(), 'failed');
}

function testSetupFailure(): void {
  const state = new RunState('run-5', testConfig());
  state.fail();
  assert.equal(state.phase, 'failed');
  assert.equal(state.stopRequested, true);
  assert.equal(state.elapsedSeconds(), 0);
  assert.equal(state.snapshot(true).rate, 0);
}

function main(): void {
  testCountersAndSnapshot();
  testStopFlipsOnce();
  testStopAfterDeadlineCountsAsCompleted();
  testFaultSettlesAsFailed();
  testSetupFailure();
  console.log('[run_state_contract] PASS');
}

main();
