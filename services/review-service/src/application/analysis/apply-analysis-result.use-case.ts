import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  jsonLogLine,
  type AnalysisCompletedMessage,
  type AnalysisResultMessage,
  type MessageTrace,
} from '@hotel-reviews/shared';
import type { Review } from '../../domain/reviews/review';
import { canTransitionReviewStatus } from '../../domain/reviews/review-status';
import {
  REVIEWS_REPOSITORY_PORT,
  type ReviewsRepositoryPort,
} from '../reviews/ports/reviews-repository.port';

export type ApplyAnalysisResultOutcome =
  | { status: 'completed'; reviewId: number }
  | { status: 'processing'; reviewId: number }
  | { status: 'skipped'; reviewId: number; currentStatus: Review['status'] }
  | { status: 'review-not-found'; reviewId: number };

/** Storage could not be read or written; the delivery is worth retrying. */
export class ReviewPersistenceError extends Error {
  constructor(
    readonly reviewId: number,
    cause: unknown,
  ) {
    super(`Failed to persist analysis state for review ${reviewId}.`, { cause });
    this.name = 'ReviewPersistenceError';
  }
}

/**
 * Sole writer of review status and analysis fields. Re-applying the same AnalysisCompleted is a full
 * overwrite, and a late AnalysisStarted never moves a review out of COMPLETED.
 */
@Injectable()
export class ApplyAnalysisResultUseCase {
  private readonly logger = new Logger(ApplyAnalysisResultUseCase.name);

  constructor(
    @Inject(REVIEWS_REPOSITORY_PORT)
    private readonly reviews: ReviewsRepositoryPort,
  ) {}

  async execute(message: AnalysisResultMessage, trace: MessageTrace): Promise<ApplyAnalysisResultOutcome> {
    const reviewId = message.review_id;
    const review = await this.persist(reviewId, () => this.reviews.findReviewById(reviewId));

    if (!review) {
      return { status: 'review-not-found', reviewId };
    }

    if (message.event_type === 'AnalysisStarted') {
      return this.applyStarted(review, trace);
    }

    return this.applyCompleted(message, trace);
  }

  private async applyStarted(review: Review, trace: MessageTrace): Promise<ApplyAnalysisResultOutcome> {
    if (!canTransitionReviewStatus(review.status, 'PROCESSING')) {
      return { status: 'skipped', reviewId: review.id, currentStatus: review.status };
    }

    const updated = await this.persist(review.id, () => this.reviews.markProcessing(review.id));
    if (!updated) {
      // The result won the race between our read and the conditional update.
      return { status: 'skipped', reviewId: review.id, currentStatus: review.status };
    }

    this.logger.log(jsonLogLine({
      level: 'info',
      service: 'review-service',
      message: 'Review marked PROCESSING.',
      correlationId: trace.correlationId,
      causationId: trace.causationId,
      messageType: 'AnalysisStarted',
      reviewId: review.id,
      hotelId: review.hotelId,
    }));
    return { status: 'processing', reviewId: review.id };
  }

  private async applyCompleted(
    message: AnalysisCompletedMessage,
    trace: MessageTrace,
  ): Promise<ApplyAnalysisResultOutcome> {
    const reviewId = message.review_id;
    let updated: boolean;

    try {
      updated = await this.reviews.completeAnalysis(reviewId, {
        sentimentScore: message.data.sentiment_score,
        sentimentLabel: message.data.sentiment_label,
        aspects: message.data.aspects,
        topics: message.data.topics,
        keyPhrases: message.data.key_phrases,
      });
    } catch (error) {
      await this.markFailedQuietly(reviewId, trace);
      throw new ReviewPersistenceError(reviewId, error);
    }

    if (!updated) {
      return { status: 'review-not-found', reviewId };
    }

    this.logger.log(jsonLogLine({
      level: 'info',
      service: 'review-service',
      message: 'Analysis result applied; review COMPLETED.',
      correlationId: trace.correlationId,
      causationId: trace.causationId,
      messageType: 'AnalysisCompleted',
      reviewId,
      metadata: {
        sentimentScore: message.data.sentiment_score,
        sentimentLabel: message.data.sentiment_label,
      },
    }));
    return { status: 'completed', reviewId };
  }

  // Secondary failures are logged only; the original error decides the delivery's fate.
  private async markFailedQuietly(reviewId: number, trace: MessageTrace): Promise<void> {
    try {
      await this.reviews.markFailed(reviewId);
    } catch (error) {
      this.logger.error(jsonLogLine({
        level: 'error',
        service: 'review-service',
        message: 'Failed to mark review FAILED after a persistence error.',
        correlationId: trace.correlationId,
        causationId: trace.causationId,
        reviewId,
        error,
      }));
    }
  }

  private async persist<T>(reviewId: number, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw new ReviewPersistenceError(reviewId, error);
    }
  }
}
