export const PIPELINE_QUEUES = {
  reviewCreated: 'review.created',
  analysisCompleted: 'analysis.completed',
} as const;

export type PipelineQueueName = (typeof PIPELINE_QUEUES)[keyof typeof PIPELINE_QUEUES];

// Messages travel through the default exchange; the routing key is the queue name.
export const DEFAULT_EXCHANGE = '';

export const PIPELINE_DEAD_LETTER_EXCHANGE = 'review-pipeline.dlx';

// One in-flight message per consumer instance. Scale out by running more instances.
export const CONSUMER_PREFETCH = 1;

export const PERSISTENT_DELIVERY_MODE = 2;

export const JSON_CONTENT_TYPE = 'application/json';

export const RETRY_ATTEMPT_HEADER = 'x-retry-attempt';

export function retryQueueFor(queue: PipelineQueueName, delayMs: number): string {
  return `${queue}.retry.${delayMs}`;
}

export function deadLetterQueueFor(queue: PipelineQueueName): string {
  return `${queue}.dlq`;
}

export const JSON_LOG_STANDARD = {
  format: 'json',
  requiredFields: [
    'timestamp',
    'level',
    'service',
    'message',
    'correlationId',
  ],
  optionalTraceFields: [
    'causationId',
    'messageId',
    'messageType',
    'routingKey',
    'queue',
    'reviewId',
    'hotelId',
    'error',
  ],
} as const;
