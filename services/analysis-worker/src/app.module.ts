import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AnalyzeReviewUseCase } from './application/analysis/analyze-review.use-case';
import { ANALYSIS_EVENTS_PUBLISHER_PORT } from './application/analysis/ports/analysis-events-publisher.port';
import { SENTIMENT_MODEL_PORT } from './application/analysis/ports/sentiment-model.port';
import { SentimentEngineService } from './application/analysis/sentiment-engine.service';
import { ServiceInfoQuery } from './application/system/service-info.query';
import {
  ANALYSIS_WORKER_ENV_FILE_PATHS,
  AnalysisWorkerConfigService,
  validateAnalysisWorkerEnvironment,
} from './infrastructure/config/analysis-worker-config.service';
import { RabbitMqAnalysisEventsPublisherAdapter } from './infrastructure/messaging/rabbitmq-analysis-events-publisher.adapter';
import { HuggingFaceSentimentModelAdapter } from './infrastructure/sentiment/hugging-face-sentiment-model.adapter';
import { AppController } from './presentation/http/system/app.controller';
import { RabbitMqReviewCreatedConsumerService } from './presentation/messaging/rabbitmq-review-created-consumer.service';
import { ReviewCreatedMessageHandler } from './presentation/messaging/review-created-message.handler';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      envFilePath: ANALYSIS_WORKER_ENV_FILE_PATHS,
      validate: validateAnalysisWorkerEnvironment,
    }),
  ],
  controllers: [AppController],
  providers: [
    AnalysisWorkerConfigService,
    ServiceInfoQuery,
    HuggingFaceSentimentModelAdapter,
    {
      provide: SENTIMENT_MODEL_PORT,
      useExisting: HuggingFaceSentimentModelAdapter,
    },
    RabbitMqAnalysisEventsPublisherAdapter,
    {
      provide: ANALYSIS_EVENTS_PUBLISHER_PORT,
      useExisting: RabbitMqAnalysisEventsPublisherAdapter,
    },
    SentimentEngineService,
    AnalyzeReviewUseCase,
    ReviewCreatedMessageHandler,
    RabbitMqReviewCreatedConsumerService,
  ],
})
export class AppModule {}
