/**
 * Phase Timer
 *
 * Tracks per-phase durations during blog generation.
 */

import type { BlogGenerationPhase, Clock, PhaseDurations } from './types';
import { BLOG_GENERATION_PHASES, systemClock } from './types';

// ============================================================================
// PhaseTimer Class
// ============================================================================

/**
 * Tracks timing for blog generation phases.
 *
 * @example
 * const timer = new PhaseTimer(clock);
 *
 * timer.start('research');
 * // ... do research ...
 * timer.end('research');
 *
 * timer.getDurations();
 * // { research: 1500, plan: 0, write: 0, assemble: 0 }
 */
export class PhaseTimer {
  private readonly startTimes = new Map<BlogGenerationPhase, number>();
  private readonly durations = new Map<BlogGenerationPhase, number>();

  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Starts timing for a phase.
   * If the phase was already started, this restarts the timer.
   */
  start(phase: BlogGenerationPhase): void {
    this.startTimes.set(phase, this.clock.now());
  }

  /**
   * Ends timing for a phase and records the duration.
   * If the phase was never started, duration will be 0.
   *
   * @returns The duration in milliseconds
   */
  end(phase: BlogGenerationPhase): number {
    const startTime = this.startTimes.get(phase);
    // startTime of 0 is valid
    const duration = startTime !== undefined ? this.clock.now() - startTime : 0;
    this.durations.set(phase, duration);
    this.startTimes.delete(phase);
    return duration;
  }

  /**
   * Gets the duration for a specific phase, 0 if it hasn't been timed.
   */
  getDuration(phase: BlogGenerationPhase): number {
    return this.durations.get(phase) ?? 0;
  }

  /**
   * Gets all phase durations. Untimed phases report 0.
   */
  getDurations(): PhaseDurations {
    return {
      research: this.getDuration('research'),
      plan: this.getDuration('plan'),
      write: this.getDuration('write'),
      assemble: this.getDuration('assemble'),
    };
  }

  getTotalDuration(): number {
    return BLOG_GENERATION_PHASES.reduce((total, phase) => total + this.getDuration(phase), 0);
  }

  /**
   * Checks if a phase has been started but not ended.
   */
  isRunning(phase: BlogGenerationPhase): boolean {
    return this.startTimes.has(phase);
  }

  /**
   * Checks if a phase has been completed (started and ended).
   */
  isCompleted(phase: BlogGenerationPhase): boolean {
    return this.durations.has(phase);
  }
}
