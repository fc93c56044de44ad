import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ApplyAnalysisResultUseCase } from './application/analysis/apply-analysis-result.use-case';
import { HotelsApplicationService } from './application/hotels/hotels.application.service';
import { HOTELS_REPOSITORY_PORT } from './application/hotels/ports/hotels-repository.port';
import { REVIEW_EVENTS_PUBLISHER_PORT } from './application/reviews/ports/review-events-publisher.port';
import { REVIEWS_REPOSITORY_PORT } from './application/reviews/ports/reviews-repository.port';
import { ReviewsApplicationService } from './application/reviews/reviews.application.service';
import { DATABASE_HEALTH_PORT } from './application/system/ports/database-health.port';
import { ServiceInfoQuery } from './application/system/service-info.query';
import {
  REVIEW_SERVICE_ENV_FILE_PATHS,
  ReviewServiceConfigService,
  validateReviewServiceEnvironment,
} from './infrastructure/config/review-service-config.service';
import { RabbitMqReviewEventsPublisherAdapter } from './infrastructure/messaging/rabbitmq-review-events-publisher.adapter';
import { PostgresReviewStoreRepository } from './infrastructure/persistence/postgres-review-store.repository';
import { HotelsController } from './presentation/http/hotels/hotels.controller';
import { ReviewsController } from './presentation/http/reviews/reviews.controller';
import { AppController } from './presentation/http/system/app.controller';
import { AnalysisResultMessageHandler } from './presentation/messaging/analysis-result-message.handler';
import { RabbitMqAnalysisResultConsumerService } from './presentation/messaging/rabbitmq-analysis-result-consumer.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      envFilePath: REVIEW_SERVICE_ENV_FILE_PATHS,
      validate: validateReviewServiceEnvironment,
    }),
  ],
  controllers: [AppController, HotelsController, ReviewsController],
  providers: [
    ReviewServiceConfigService,
    PostgresReviewStoreRepository,
    {
      provide: REVIEWS_REPOSITORY_PORT,
      useExisting: PostgresReviewStoreRepository,
    },
    {
      provide: HOTELS_REPOSITORY_PORT,
      useExisting: PostgresReviewStoreRepository,
    },
    {
      provide: DATABASE_HEALTH_PORT,
      useExisting: PostgresReviewStoreRepository,
    },
    RabbitMqReviewEventsPublisherAdapter,
    {
      provide: REVIEW_EVENTS_PUBLISHER_PORT,
      useExisting: RabbitMqReviewEventsPublisherAdapter,
    },
    ServiceInfoQuery,
    HotelsApplicationService,
    ReviewsApplicationService,
    ApplyAnalysisResultUseCase,
    AnalysisResultMessageHandler,
    RabbitMqAnalysisResultConsumerService,
  ],
})
export class AppModule {}
