import { Injectable, Logger } from '@nestjs/common';
import {
  PIPELINE_QUEUES,
  applyRabbitMqRetryPolicy,
  createRabbitMqConsumerJsonLogLine,
  decodeAnalysisResultMessage,
  readMessageTrace,
  rejectPoisonMessage,
  type RabbitMqConsumerChannelLike,
  type RabbitMqConsumerMessageLike,
} from '@hotel-reviews/shared';
import {
  ApplyAnalysisResultUseCase,
  ReviewPersistenceError,
} from '../../application/analysis/apply-analysis-result.use-case';
import { ReviewServiceConfigService } from '../../infrastructure/config/review-service-config.service';

const SERVICE_NAME = 'review-service';

@Injectable()
export class AnalysisResultMessageHandler {
  private readonly logger = new Logger(AnalysisResultMessageHandler.name);
  private readonly queue = PIPELINE_QUEUES.analysisCompleted;

  constructor(
    private readonly applyAnalysisResultUseCase: ApplyAnalysisResultUseCase,
    private readonly config: ReviewServiceConfigService,
  ) {}

  async handle(channel: RabbitMqConsumerChannelLike, message: RabbitMqConsumerMessageLike): Promise<void> {
    const queue = this.queue;
    const decoded = decodeAnalysisResultMessage(message.content);

    switch (decoded.status) {
      case 'invalid-json':
        rejectPoisonMessage(channel, message);
        this.logger.error(createRabbitMqConsumerJsonLogLine({
          level: 'error',
          service: SERVICE_NAME,
          message: 'Invalid JSON in analysis result message; dead-lettered.',
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

    const result = decoded.message;

    try {
      const outcome = await this.applyAnalysisResultUseCase.execute(result, readMessageTrace(message));

      if (outcome.status === 'review-not-found') {
        rejectPoisonMessage(channel, message);
        this.logger.error(createRabbitMqConsumerJsonLogLine({
          level: 'error',
          service: SERVICE_NAME,
          message: `Review ${outcome.reviewId} not found for ${result.event_type}; dead-lettered.`,
          queue,
          amqpMessage: message,
          body: result,
        }));
        return;
      }

      channel.ack(message);
      if (outcome.status === 'skipped') {
        this.logger.log(createRabbitMqConsumerJsonLogLine({
          level: 'info',
          service: SERVICE_NAME,
          message: `Skipped ${result.event_type}; review is already ${outcome.currentStatus}.`,
          queue,
          amqpMessage: message,
          body: result,
        }));
      }
    } catch (error) {
      if (error instanceof ReviewPersistenceError) {
        const decision = await applyRabbitMqRetryPolicy({
          channel,
          message,
          queue,
          schedule: this.config.retrySchedule,
          parkingReason: 'persistence-failed',
        });
        this.logger.error(createRabbitMqConsumerJsonLogLine({
          level: 'error',
          service: SERVICE_NAME,
          message: `Failed to persist ${result.event_type} for review ${error.reviewId}; action=${decision.action}.`,
          queue,
          amqpMessage: message,
          body: result,
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
        message: `Unexpected error while applying ${result.event_type}; dead-lettered.`,
        queue,
        amqpMessage: message,
        body: result,
        error,
      }));
    }
  }
}
