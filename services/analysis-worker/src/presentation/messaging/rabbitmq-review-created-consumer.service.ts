import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { PIPELINE_QUEUES, RabbitMqQueueConsumer } from '@hotel-reviews/shared';
import { AnalysisWorkerConfigService } from '../../infrastructure/config/analysis-worker-config.service';
import { ReviewCreatedMessageHandler } from './review-created-message.handler';

@Injectable()
export class RabbitMqReviewCreatedConsumerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RabbitMqReviewCreatedConsumerService.name);
  private readonly consumer: RabbitMqQueueConsumer;

  constructor(
    handler: ReviewCreatedMessageHandler,
    config: AnalysisWorkerConfigService,
  ) {
    this.consumer = new RabbitMqQueueConsumer({
      url: config.rabbitmqUrl,
      queue: PIPELINE_QUEUES.reviewCreated,
      logger: this.logger,
      reconnectDelayMs: config.reconnectDelayMs,
      retrySchedule: config.retrySchedule,
      handle: (channel, message) => handler.handle(channel, message),
    });
  }

  async onModuleInit(): Promise<void> {
    await this.consumer.start();
  }

  // The result publisher closes in onApplicationShutdown, after this has drained.
  async onModuleDestroy(): Promise<void> {
    await this.consumer.stop();
  }
}
