import { Injectable, Logger, OnApplicationShutdown, OnModuleInit } from '@nestjs/common';
import {
  DEFAULT_EXCHANGE,
  RabbitMqPublisherConnection,
  describeError,
  generateId,
  jsonLogLine,
  queueForMessage,
  type MessageTrace,
  type ReviewCreatedMessage,
} from '@hotel-reviews/shared';
import type { ReviewEventsPublisherPort } from '../../application/reviews/ports/review-events-publisher.port';
import { ReviewServiceConfigService } from '../config/review-service-config.service';

/**
 * Review Publisher. Owns one confirm-channel connection per process, opened at startup and
 * re-opened on demand after a failure.
 */
@Injectable()
export class RabbitMqReviewEventsPublisherAdapter
  implements ReviewEventsPublisherPort, OnModuleInit, OnApplicationShutdown
{
  private readonly logger = new Logger(RabbitMqReviewEventsPublisherAdapter.name);
  private readonly connection: RabbitMqPublisherConnection;

  constructor(config: ReviewServiceConfigService) {
    this.connection = new RabbitMqPublisherConnection({
      url: config.rabbitmqUrl,
      logger: this.logger,
    });
  }

  async onModuleInit(): Promise<void> {
    try {
      await this.connection.open();
    } catch (error) {
      this.logger.warn(`AMQP publisher not ready at startup; will connect on first publish. ${describeError(error)}`);
    }
  }

  async onApplicationShutdown(): Promise<void> {
    await this.connection.close();
  }

  async publishReviewCreated(message: ReviewCreatedMessage, trace: MessageTrace): Promise<boolean> {
    const messageId = generateId();
    const routingKey = queueForMessage(message);

    try {
      await this.connection.publishJson({
        exchange: DEFAULT_EXCHANGE,
        routingKey,
        body: message,
        messageId,
        correlationId: trace.correlationId,
        causationId: trace.causationId,
        type: message.event_type,
      });
      return true;
    } catch (error) {
      this.logger.error(jsonLogLine({
        level: 'error',
        service: 'review-service',
        message: 'Failed to publish ReviewCreated.',
        correlationId: trace.correlationId,
        messageId,
        messageType: message.event_type,
        routingKey,
        reviewId: message.review_id,
        hotelId: message.hotel_id,
        error,
      }));
      return false;
    }
  }
}
