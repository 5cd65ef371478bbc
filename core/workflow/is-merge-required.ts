import type { ComparisonStatus } from '../../types/comparison'

/**
 * Head still has commits the base lacks.
 *
 * @param status - Comparison status.
 * @returns True for `ahead` and `diverged`.
 */
export function isMergeRequired(status: ComparisonStatus): boolean {
  return status === 'ahead' || status === 'diverged'
}
