import type { NewReview, Review, ReviewAnalysisFields } from '../../../domain/reviews/review';
import type { ReviewStatus } from '../../../domain/reviews/review-status';

export const REVIEWS_REPOSITORY_PORT = Symbol('REVIEWS_REPOSITORY_PORT');

export interface ListReviewsByHotelInput {
  hotelId: number;
  limit: number;
  offset: number;
  status?: ReviewStatus;
}

export interface ReviewsRepositoryPort {
  createReview(input: NewReview): Promise<Review>;
  findReviewById(reviewId: number): Promise<Review | undefined>;
  listReviewsByHotel(input: ListReviewsByHotelInput): Promise<{ items: Review[]; total: number }>;
  /** Writes every analysis field and COMPLETED in one statement. False when the row is gone. */
  completeAnalysis(reviewId: number, fields: ReviewAnalysisFields): Promise<boolean>;
  /** Conditional: false when the current status does not allow PROCESSING. */
  markProcessing(reviewId: number): Promise<boolean>;
  /** Never overwrites a COMPLETED review. */
  markFailed(reviewId: number): Promise<boolean>;
}
