import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  createAnalysisCompletedMessage,
  createAnalysisStartedMessage,
  jsonLogLine,
  type MessageTrace,
  type ReviewCreatedMessage,
} from '@hotel-reviews/shared';
import type { SentimentResult } from '../../domain/sentiment/sentiment-scoring';
import { AnalysisWorkerConfigService } from '../../infrastructure/config/analysis-worker-config.service';
import {
  ANALYSIS_EVENTS_PUBLISHER_PORT,
  type AnalysisEventsPublisherPort,
} from './ports/analysis-events-publisher.port';
import { SentimentEngineService } from './sentiment-engine.service';

/** The result could not be handed to the broker; the delivery is worth retrying. */
export class AnalysisResultPublishError extends Error {
  constructor(
    readonly reviewId: number,
    cause: unknown,
  ) {
    super(`Failed to publish AnalysisCompleted for review ${reviewId}.`, { cause });
    this.name = 'AnalysisResultPublishError';
  }
}

@Injectable()
export class AnalyzeReviewUseCase {
  private readonly logger = new Logger(AnalyzeReviewUseCase.name);

  constructor(
    private readonly sentimentEngine: SentimentEngineService,
    @Inject(ANALYSIS_EVENTS_PUBLISHER_PORT)
    private readonly eventsPublisher: AnalysisEventsPublisherPort,
    private readonly config: AnalysisWorkerConfigService,
  ) {}

  async execute(message: ReviewCreatedMessage, trace: MessageTrace): Promise<SentimentResult> {
    const reviewId = message.review_id;

    if (this.config.publishStartedEvents) {
      await this.publishStarted(message, trace);
    }

    const result = await this.sentimentEngine.analyze(message.content, message.rating, {
      correlationId: trace.correlationId,
      reviewId,
    });

    try {
      await this.eventsPublisher.publishAnalysisCompleted(
        createAnalysisCompletedMessage(reviewId, result),
        trace,
      );
    } catch (error) {
      throw new AnalysisResultPublishError(reviewId, error);
    }

    this.logger.log(jsonLogLine({
      level: 'info',
      service: 'analysis-worker',
      message: 'Review analyzed and AnalysisCompleted published.',
      correlationId: trace.correlationId,
      causationId: trace.causationId,
      messageType: 'AnalysisCompleted',
      reviewId,
      hotelId: message.hotel_id,
      metadata: {
        sentimentScore: result.score,
        sentimentLabel: result.label,
        source: result.source,
      },
    }));

    return result;
  }

  private async publishStarted(message: ReviewCreatedMessage, trace: MessageTrace): Promise<void> {
    try {
      await this.eventsPublisher.publishAnalysisStarted(
        createAnalysisStartedMessage(message.review_id),
        trace,
      );
    } catch (error) {
      this.logger.warn(jsonLogLine({
        level: 'warn',
        service: 'analysis-worker',
        message: 'Failed to publish AnalysisStarted; continuing with analysis.',
        correlationId: trace.correlationId,
        causationId: trace.causationId,
        messageType: 'AnalysisStarted',
        reviewId: message.review_id,
        error,
      }));
    }
  }
}
