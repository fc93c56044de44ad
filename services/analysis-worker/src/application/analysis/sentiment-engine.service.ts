import { Inject, Injectable, Logger } from '@nestjs/common';
import { jsonLogLine } from '@hotel-reviews/shared';
import {
  scoreFromPrediction,
  scoreFromRating,
  truncateForAnalysis,
  type SentimentResult,
} from '../../domain/sentiment/sentiment-scoring';
import { SENTIMENT_MODEL_PORT, type SentimentModelPort } from './ports/sentiment-model.port';

export interface AnalyzeContext {
  correlationId: string;
  reviewId?: number;
}

/**
 * Blends the model's star prediction with the reviewer's rating. A model failure degrades to the
 * rating-only score; this method does not reject.
 */
@Injectable()
export class SentimentEngineService {
  private readonly logger = new Logger(SentimentEngineService.name);

  constructor(
    @Inject(SENTIMENT_MODEL_PORT)
    private readonly model: SentimentModelPort,
  ) {}

  async analyze(text: string, rating: number, context?: AnalyzeContext): Promise<SentimentResult> {
    try {
      const prediction = await this.model.classify(truncateForAnalysis(text));
      return scoreFromPrediction(prediction.label, rating);
    } catch (error) {
      this.logger.warn(jsonLogLine({
        level: 'warn',
        service: 'analysis-worker',
        message: 'Sentiment model unavailable; using rating-only score.',
        correlationId: context?.correlationId ?? 'unknown',
        reviewId: context?.reviewId,
        error,
      }));
      return scoreFromRating(rating);
    }
  }
}
