/**
 * ProgressTracker Utilities
 *
 * Progress reporting and cancellation support for long-running sync operations.
 */

/**
 * Generic progress interface
 * @template Phase String union type for phase names (e.g., 'fetching' | 'reconciling' | 'complete')
 */
export interface OperationProgress<Phase extends string = string> {
  /** Number of items processed so far */
  current: number
  /** Total number of items to process */
  total: number
  /** Display name of the current item being processed */
  currentItem: string
  /** Current phase of the operation */
  phase: Phase
  /** Completion percentage (0-100) */
  percentage: number
  /** Number of items skipped */
  skipped?: number
}

export type ProgressCallback<Phase extends string = string> = (progress: OperationProgress<Phase>) => void

/**
 * Base class for cancellable operations
 *
 * @example
 * class MyService extends CancellableOperation {
 *   async run() {
 *     this.resetCancellation()
 *     for (const item of items) {
 *       if (this.isCancelled()) {
 *         return { completed: false }
 *       }
 *       await processItem(item)
 *     }
 *     return { completed: true }
 *   }
 * }
 */
export class CancellableOperation {
  private cancelled = false

  /**
   * Request cancellation of the current operation
   */
  cancel(): void {
    this.cancelled = true
  }

  /**
   * Check if cancellation has been requested
   */
  isCancelled(): boolean {
    return this.cancelled
  }

  /**
   * Reset the cancellation flag (call at start of new operation)
   */
  protected resetCancellation(): void {
    this.cancelled = false
  }
}

/**
 * Calculate progress percentage
 *
 * @param current Number of items processed
 * @param total Total number of items
 * @returns Percentage (0-100)
 */
export function calculatePercentage(current: number, total: number): number {
  if (total === 0) return 100
  return Math.round((current / total) * 100)
}

/**
 * Create a progress object with standard fields
 */
export function createProgress<Phase extends string>(
  current: number,
  total: number,
  currentItem: string,
  phase: Phase,
  skipped?: number
): OperationProgress<Phase> {
  return {
    current,
    total,
    currentItem,
    phase,
    percentage: calculatePercentage(current, total),
    skipped,
  }
}
