/**
 * Progress Tracker
 *
 * Centralized progress reporting for blog generation.
 */

import { GENERATOR_CONFIG } from './config';
import type { BlogGenerationPhase, BlogProgressCallback } from './types';

// ============================================================================
// Types
// ============================================================================

interface ProgressTrackerConfig {
  /** Start percentage for write-phase section progress (default: 10) */
  readonly writeProgressStart: number;
  /** End percentage for write-phase section progress (default: 90) */
  readonly writeProgressEnd: number;
}

// ============================================================================
// ProgressTracker Class
// ============================================================================

/**
 * Tracks and reports progress for blog generation.
 *
 * @example
 * const tracker = new ProgressTracker(onProgress);
 *
 * tracker.startPhase('research');
 * tracker.completePhase('research', 'Found 5 sources');
 *
 * tracker.startPhase('write');
 * tracker.reportSectionProgress(1, 5, 'Introduction');
 * tracker.completePhase('write', 'Wrote 5 sections');
 */
export class ProgressTracker {
  private readonly config: ProgressTrackerConfig;

  constructor(
    private readonly onProgress?: BlogProgressCallback,
    config?: Partial<ProgressTrackerConfig>
  ) {
    this.config = {
      writeProgressStart: config?.writeProgressStart ?? GENERATOR_CONFIG.WRITE_PROGRESS_START,
      writeProgressEnd: config?.writeProgressEnd ?? GENERATOR_CONFIG.WRITE_PROGRESS_END,
    };
  }

  /**
   * Reports the start of a phase (0% progress).
   */
  startPhase(phase: BlogGenerationPhase, message?: string): void {
    this.onProgress?.(phase, 0, message ?? this.getDefaultStartMessage(phase));
  }

  /**
   * Reports the completion of a phase (100% progress).
   */
  completePhase(phase: BlogGenerationPhase, message: string): void {
    this.onProgress?.(phase, 100, message);
  }

  /**
   * Reports progress during the write phase, scaled between
   * writeProgressStart and writeProgressEnd.
   *
   * @param current - Units written so far (1-indexed)
   * @param total - Total units (introduction + sections + conclusion)
   * @param label - Name of the unit just written
   */
  reportSectionProgress(current: number, total: number, label: string): void {
    const { writeProgressStart, writeProgressEnd } = this.config;
    const progressRange = writeProgressEnd - writeProgressStart;
    const sectionProgress = Math.round(writeProgressStart + (current / total) * progressRange);
    this.onProgress?.('write', sectionProgress, `Wrote ${current}/${total}: ${label}`);
  }

  /**
   * Reports arbitrary progress within a phase.
   */
  report(phase: BlogGenerationPhase, progress: number, message?: string): void {
    this.onProgress?.(phase, progress, message);
  }

  get hasCallback(): boolean {
    return this.onProgress !== undefined;
  }

  private getDefaultStartMessage(phase: BlogGenerationPhase): string {
    switch (phase) {
      case 'research':
        return 'Researching topic';
      case 'plan':
        return 'Planning outline';
      case 'write':
        return 'Writing sections';
      case 'assemble':
        return 'Assembling document';
    }
  }
}
