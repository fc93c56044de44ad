export const REVIEW_STATUSES = ['PENDING', 'PROCESSING', 'COMPLETED', 'FAILED'] as const;

export type ReviewStatus = (typeof REVIEW_STATUSES)[number];

// COMPLETED only accepts a re-application of the same result.
const ALLOWED_TRANSITIONS: Record<ReviewStatus, readonly ReviewStatus[]> = {
  PENDING: ['PROCESSING', 'COMPLETED', 'FAILED'],
  PROCESSING: ['COMPLETED', 'FAILED'],
  FAILED: ['PROCESSING', 'COMPLETED', 'FAILED'],
  COMPLETED: ['COMPLETED'],
};

export function isReviewStatus(value: unknown): value is ReviewStatus {
  return typeof value === 'string' && REVIEW_STATUSES.some((status) => status === value);
}

export function canTransitionReviewStatus(from: ReviewStatus, to: ReviewStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/** Statuses a review may be in for the given target status to be applied. */
export function statusesAllowingTransitionTo(target: ReviewStatus): ReviewStatus[] {
  return REVIEW_STATUSES.filter((status) => canTransitionReviewStatus(status, target));
}
