import { LifecycleError } from '../errors.js';

export type RunPhase = 'idle' | 'running' | 'completed' | 'stopped' | 'failed';

export type TerminalPhase = Extract<RunPhase, 'completed' | 'stopped' | 'failed'>;

const ALLOWED: Record<RunPhase, readonly RunPhase[]> = {
  idle: ['running', 'failed'],
  running: ['completed', 'stopped', 'failed'],
  completed: [],
  stopped: [],
  failed: [],
};

export function isTerminalPhase(phase: RunPhase): phase is TerminalPhase {
  return phase === 'completed' || phase === 'stopped' || phase === 'failed';
}

export function canAdvance(from: RunPhase, to: RunPhase): boolean {
  return ALLOWED[from].includes(to);
}

export function advancePhase(from: RunPhase, to: RunPhase): RunPhase {
  if (!canAdvance(from, to)) {
    throw new LifecycleError(`Run cannot move from ${from} to ${to}`);
  }
  return to;
}
