import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { PIPELINE_QUEUES, RabbitMqQueueConsumer } from '@hotel-reviews/shared';
import { ReviewServiceConfigService } from '../../infrastructure/config/review-service-config.service';
import { AnalysisResultMessageHandler } from './analysis-result-message.handler';

/** Result Consumer loop on `analysis.completed`. */
@Injectable()
export class RabbitMqAnalysisResultConsumerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RabbitMqAnalysisResultConsumerService.name);
  private readonly consumer: RabbitMqQueueConsumer;

  constructor(
    handler: AnalysisResultMessageHandler,
    config: ReviewServiceConfigService,
  ) {
    this.consumer = new RabbitMqQueueConsumer({
      url: config.rabbitmqUrl,
      queue: PIPELINE_QUEUES.analysisCompleted,
      logger: this.logger,
      reconnectDelayMs: config.reconnectDelayMs,
      retrySchedule: config.retrySchedule,
      handle: (channel, message) => handler.handle(channel, message),
    });
  }

  async onModuleInit(): Promise<void> {
    await this.consumer.start();
  }

  // The review publisher and the database pool close in onApplicationShutdown, after this has drained.
  async onModuleDestroy(): Promise<void> {
    await this.consumer.stop();
  }
}
