import { Injectable, Logger } from '@nestjs/common';
import {
  PIPELINE_QUEUES,
  applyRabbitMqRetryPolicy,
  createRabbitMqConsumerJsonLogLine,
  decodeIntakeMessage,
  readMessageTrace,
  rejectPoisonMessage,
  type RabbitMqConsumerChannelLike,
  type RabbitMqConsumerMessageLike,
} from '@hotel-reviews/shared';
import {
  AnalysisResultPublishError,
  AnalyzeReviewUseCase,
} from '../../application/analysis/analyze-review.use-case';
import { AnalysisWorkerConfigService } from '../../infrastructure/config/analysis-worker-config.service';

const SERVICE_NAME = 'analysis-worker';

/**
 * Settles every `review.created` delivery exactly once: ack on success, retry queue for a failed
 * result publish, dead-letter for anything undecodable or unexpected.
 */
@Injectable()
export class ReviewCreatedMessageHandler {
  private readonly logger = new Logger(ReviewCreatedMessageHandler.name);
  private readonly queue = PIPELINE_QUEUES.reviewCreated;

  constructor(
    private readonly analyzeReviewUseCase: AnalyzeReviewUseCase,
    private readonly config: AnalysisWorkerConfigService,
  ) {}

  async handle(channel: RabbitMqConsumerChannelLike, message: RabbitMqConsumerMessageLike): Promise<void> {
    const queue = this.queue;
    const decoded = decodeIntakeMessage(message.content);

    switch (decoded.status) {
      case 'invalid-json':
        rejectPoisonMessage(channel, message);
        this.logger.error(createRabbitMqConsumerJsonLogLine({
          level: 'error',
          service: SERVICE_NAME,
          message: 'Invalid JSON in review.created message; dead-lettered.',
          queue,
          amqpMessage: message,
          error: decoded.error,
        }));
        return;
      case 'invalid-message':
        rejectPoisonMessage(channel, message);
        this.logger.error(createRabbitMqConsumerJsonLogLine({
          level: 'error',
          service: SERVICE_NAME,
          message: `Invalid ${decoded.eventType ?? 'untyped'} message; dead-lettered. ${decoded.reason}`,
          queue,
          amqpMessage: message,
        }));
        return;
      case 'unsupported-event':
        channel.ack(message);
        this.logger.warn(createRabbitMqConsumerJsonLogLine({
          level: 'warn',
          service: SERVICE_NAME,
          message: `Ignoring unsupported event type=${decoded.eventType}.`,
          queue,
          amqpMessage: message,
        }));
        return;
      case 'decoded':
        break;
    }

    const review = decoded.message;
    const trace = readMessageTrace(message);

    try {
      await this.analyzeReviewUseCase.execute(review, trace);
      channel.ack(message);
    } catch (error) {
      if (error instanceof AnalysisResultPublishError) {
        const decision = await applyRabbitMqRetryPolicy({
          channel,
          message,
          queue,
          schedule: this.config.retrySchedule,
          parkingReason: 'result-publish-failed',
        });
        this.logger.error(createRabbitMqConsumerJsonLogLine({
          level: 'error',
          service: SERVICE_NAME,
          message: `Failed to publish analysis result for review ${review.review_id}; action=${decision.action}.`,
          queue,
          amqpMessage: message,
          body: review,
          error: error.cause ?? error,
          metadata: {
            retryAction: decision.action,
            attempt: decision.attempt,
            maxDeliveryAttempts: decision.maxDeliveryAttempts,
            delayMs: decision.delayMs,
          },
        }));
        return;
      }

      rejectPoisonMessage(channel, message);
      this.logger.error(createRabbitMqConsumerJsonLogLine({
        level: 'error',
        service: SERVICE_NAME,
        message: `Unexpected error while analyzing review ${review.review_id}; dead-lettered.`,
        queue,
        amqpMessage: message,
        body: review,
        error,
      }));
    }
  }
}
