import { PIPELINE_QUEUES, type PipelineQueueName } from '../standards';

export type PipelineEventType = 'ReviewCreated' | 'AnalysisStarted' | 'AnalysisCompleted';

export type SentimentLabel = 'positive' | 'negative' | 'neutral';

export interface ReviewAspect {
  name: string;
  score: number;
  sentiment: SentimentLabel;
}

export interface ReviewCreatedMessage {
  event_type: 'ReviewCreated';
  review_id: number;
  hotel_id: number;
  title: string | null;
  content: string;
  rating: number;
}

export interface AnalysisStartedMessage {
  event_type: 'AnalysisStarted';
  review_id: number;
}

// aspects, topics and key_phrases are reserved; the worker always sends null today.
export interface AnalysisResultData {
  sentiment_score: number;
  sentiment_label: SentimentLabel;
  aspects: ReviewAspect[] | null;
  topics: string[] | null;
  key_phrases: string[] | null;
}

export interface AnalysisCompletedMessage {
  event_type: 'AnalysisCompleted';
  review_id: number;
  data: AnalysisResultData;
}

export type PipelineMessage = ReviewCreatedMessage | AnalysisStartedMessage | AnalysisCompletedMessage;

export type AnalysisResultMessage = AnalysisStartedMessage | AnalysisCompletedMessage;

export interface MessageCatalogEntry {
  type: PipelineEventType;
  queue: PipelineQueueName;
  producer: string;
  consumers: string[];
}

export const MESSAGE_CATALOG: Record<PipelineEventType, MessageCatalogEntry> = {
  ReviewCreated: {
    type: 'ReviewCreated',
    queue: PIPELINE_QUEUES.reviewCreated,
    producer: 'review-service',
    consumers: ['analysis-worker'],
  },
  AnalysisStarted: {
    type: 'AnalysisStarted',
    queue: PIPELINE_QUEUES.analysisCompleted,
    producer: 'analysis-worker',
    consumers: ['review-service'],
  },
  AnalysisCompleted: {
    type: 'AnalysisCompleted',
    queue: PIPELINE_QUEUES.analysisCompleted,
    producer: 'analysis-worker',
    consumers: ['review-service'],
  },
};

export function queueForMessage(message: PipelineMessage): PipelineQueueName {
  return MESSAGE_CATALOG[message.event_type].queue;
}

export function createReviewCreatedMessage(review: {
  id: number;
  hotelId: number;
  title: string | null;
  content: string;
  rating: number;
}): ReviewCreatedMessage {
  return {
    event_type: 'ReviewCreated',
    review_id: review.id,
    hotel_id: review.hotelId,
    title: review.title,
    content: review.content,
    rating: review.rating,
  };
}

export function createAnalysisStartedMessage(reviewId: number): AnalysisStartedMessage {
  return {
    event_type: 'AnalysisStarted',
    review_id: reviewId,
  };
}

export function createAnalysisCompletedMessage(
  reviewId: number,
  sentiment: { score: number; label: SentimentLabel },
): AnalysisCompletedMessage {
  return {
    event_type: 'AnalysisCompleted',
    review_id: reviewId,
    data: {
      sentiment_score: sentiment.score,
      sentiment_label: sentiment.label,
      aspects: null,
      topics: null,
      key_phrases: null,
    },
  };
}

export function isSentimentLabel(value: unknown): value is SentimentLabel {
  return value === 'positive' || value === 'negative' || value === 'neutral';
}
