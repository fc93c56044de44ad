import test from 'node:test';
import assert from 'node:assert/strict';
import { AnalyzeReviewUseCase } from '../../services/analysis-worker/src/application/analysis/analyze-review.use-case';
import type { SentimentModelPort } from '../../services/analysis-worker/src/application/analysis/ports/sentiment-model.port';
import { SentimentEngineService } from '../../services/analysis-worker/src/application/analysis/sentiment-engine.service';
import { ReviewCreatedMessageHandler } from '../../services/analysis-worker/src/presentation/messaging/review-created-message.handler';
import { ApplyAnalysisResultUseCase } from '../../services/review-service/src/application/analysis/apply-analysis-result.use-case';
import { ReviewsApplicationService } from '../../services/review-service/src/application/reviews/reviews.application.service';
import { AnalysisResultMessageHandler } from '../../services/review-service/src/presentation/messaging/analysis-result-message.handler';
import { createAnalysisWorkerConfig, createReviewServiceConfig } from '../support/config';
import {
  BrokerAnalysisEventsPublisher,
  BrokerReviewEventsPublisher,
  InMemoryBroker,
} from '../support/in-memory-broker';
import { InMemoryReviewStore } from '../support/in-memory-review-store';

function createPipeline(model: SentimentModelPort) {
  const broker = new InMemoryBroker();
  const store = new InMemoryReviewStore({ firstReviewId: 42 });
  store.seedHotel({ id: 7, name: 'Harbour View' });

  const reviewServiceConfig = createReviewServiceConfig();
  const reviews = new ReviewsApplicationService(
    store,
    store,
    new BrokerReviewEventsPublisher(broker),
    reviewServiceConfig,
  );
  const resultHandler = new AnalysisResultMessageHandler(new ApplyAnalysisResultUseCase(store), reviewServiceConfig);

  const workerConfig = createAnalysisWorkerConfig();
  const worker = new ReviewCreatedMessageHandler(
    new AnalyzeReviewUseCase(new SentimentEngineService(model), new BrokerAnalysisEventsPublisher(broker), workerConfig),
    workerConfig,
  );

  return { broker, store, reviews, worker, resultHandler };
}

const positiveModel: SentimentModelPort = {
  async classify() {
    return { label: '5 stars', score: 0.97 };
  },
};

test('a submitted review flows through analysis to COMPLETED', async () => {
  const { broker, store, reviews, worker, resultHandler } = createPipeline(positiveModel);

  const created = await reviews.createReview({
    hotelId: 7,
    userName: 'Ana',
    rating: 5,
    title: 'Great weekend',
    content: 'Excellent stay, loved everything',
    correlationId: 'corr-flow-1',
  });

  assert.equal(created.id, 42);
  assert.equal(created.analysisQueued, true);
  assert.equal(broker.depth('review.created'), 1);

  assert.equal(await broker.drain('review.created', (channel, message) => worker.handle(channel, message)), 1);
  const results = broker.peek('analysis.completed');
  assert.deepEqual(
    results.map((message) => message.properties.type),
    ['AnalysisStarted', 'AnalysisCompleted'],
  );
  assert.deepEqual(
    results.map((message) => message.properties.correlationId),
    ['corr-flow-1', 'corr-flow-1'],
  );

  assert.equal(
    await broker.drain('analysis.completed', (channel, message) => resultHandler.handle(channel, message)),
    2,
  );

  const review = store.review(42);
  assert.equal(review?.status, 'COMPLETED');
  assert.equal(review?.sentimentScore, 1);
  assert.equal(review?.sentimentLabel, 'positive');
  assert.equal(broker.acked.length, 3);
  assert.equal(broker.nacked.length, 0);
});

test('a redelivered result and a late AnalysisStarted leave the completed review unchanged', async () => {
  const { broker, store, reviews, worker, resultHandler } = createPipeline(positiveModel);

  await reviews.createReview({
    hotelId: 7,
    userName: 'Ana',
    rating: 5,
    content: 'Excellent stay, loved everything',
  });
  await broker.drain('review.created', (channel, message) => worker.handle(channel, message));
  const [started, completedResult] = broker.peek('analysis.completed');
  assert.ok(started && completedResult);

  await resultHandler.handle(broker, completedResult);
  const afterFirst = store.review(42);
  await resultHandler.handle(broker, completedResult);
  await resultHandler.handle(broker, started);

  assert.deepEqual(store.review(42), afterFirst);
  assert.equal(afterFirst?.status, 'COMPLETED');
});

test('the rating alone scores the review when the model is down', async () => {
  const { broker, store, reviews, worker, resultHandler } = createPipeline({
    async classify() {
      throw new Error('model loading');
    },
  });

  await reviews.createReview({
    hotelId: 7,
    userName: 'Bo',
    rating: 1,
    content: 'Noisy street and a broken shower',
  });
  await broker.drain('review.created', (channel, message) => worker.handle(channel, message));
  await broker.drain('analysis.completed', (channel, message) => resultHandler.handle(channel, message));

  const review = store.review(42);
  assert.equal(review?.status, 'COMPLETED');
  assert.equal(review?.sentimentScore, -1);
  assert.equal(review?.sentimentLabel, 'negative');
});
