import { Injectable, Logger, OnApplicationShutdown, OnModuleInit } from '@nestjs/common';
import {
  DEFAULT_EXCHANGE,
  RabbitMqPublisherConnection,
  describeError,
  generateId,
  queueForMessage,
  type AnalysisCompletedMessage,
  type AnalysisStartedMessage,
  type MessageTrace,
  type PipelineMessage,
} from '@hotel-reviews/shared';
import type { AnalysisEventsPublisherPort } from '../../application/analysis/ports/analysis-events-publisher.port';
import { AnalysisWorkerConfigService } from '../config/analysis-worker-config.service';

@Injectable()
export class RabbitMqAnalysisEventsPublisherAdapter
  implements AnalysisEventsPublisherPort, OnModuleInit, OnApplicationShutdown
{
  private readonly logger = new Logger(RabbitMqAnalysisEventsPublisherAdapter.name);
  private readonly connection: RabbitMqPublisherConnection;

  constructor(config: AnalysisWorkerConfigService) {
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

  async publishAnalysisStarted(message: AnalysisStartedMessage, trace: MessageTrace): Promise<void> {
    await this.publish(message, trace);
  }

  async publishAnalysisCompleted(message: AnalysisCompletedMessage, trace: MessageTrace): Promise<void> {
    await this.publish(message, trace);
  }

  private async publish(message: PipelineMessage, trace: MessageTrace): Promise<void> {
    await this.connection.publishJson({
      exchange: DEFAULT_EXCHANGE,
      routingKey: queueForMessage(message),
      body: message,
      messageId: generateId(),
      correlationId: trace.correlationId,
      causationId: trace.causationId,
      type: message.event_type,
    });
  }
}
