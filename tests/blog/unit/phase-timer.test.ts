import { describe, it, expect } from 'vitest';

import { PhaseTimer } from '../../../src/ai/blog/phase-timer';
import type { Clock } from '../../../src/ai/blog/types';

function steppingClock(times: number[]): Clock {
  let index = 0;
  return { now: () => times[Math.min(index++, times.length - 1)] };
}

describe('PhaseTimer', () => {
  it('records the duration between start and end', () => {
    const timer = new PhaseTimer(steppingClock([1000, 2500]));

    timer.start('research');
    const duration = timer.end('research');

    expect(duration).toBe(1500);
    expect(timer.getDuration('research')).toBe(1500);
  });

  it('accepts a start time of zero', () => {
    const timer = new PhaseTimer(steppingClock([0, 40]));

    timer.start('plan');

    expect(timer.end('plan')).toBe(40);
  });

  it('reports zero for a phase that was never started', () => {
    const timer = new PhaseTimer(steppingClock([100]));

    expect(timer.end('write')).toBe(0);
    expect(timer.isCompleted('write')).toBe(true);
  });

  it('reports every phase in getDurations', () => {
    const timer = new PhaseTimer(steppingClock([0, 10, 20, 50]));

    timer.start('research');
    timer.end('research');
    timer.start('write');
    timer.end('write');

    expect(timer.getDurations()).toEqual({ research: 10, plan: 0, write: 30, assemble: 0 });
    expect(timer.getTotalDuration()).toBe(40);
  });

  it('tracks running and completed state', () => {
    const timer = new PhaseTimer(steppingClock([0, 5]));

    timer.start('assemble');
    expect(timer.isRunning('assemble')).toBe(true);
    expect(timer.isCompleted('assemble')).toBe(false);

    timer.end('assemble');
    expect(timer.isRunning('assemble')).toBe(false);
    expect(timer.isCompleted('assemble')).toBe(true);
  });
});
