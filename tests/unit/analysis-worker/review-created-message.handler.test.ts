import test from 'node:test';
import assert from 'node:assert/strict';
import type { AnalysisCompletedMessage } from '../../../packages/shared/src';
import { AnalyzeReviewUseCase } from '../../../services/analysis-worker/src/application/analysis/analyze-review.use-case';
import type { AnalysisEventsPublisherPort } from '../../../services/analysis-worker/src/application/analysis/ports/analysis-events-publisher.port';
import { SentimentEngineService } from '../../../services/analysis-worker/src/application/analysis/sentiment-engine.service';
import type { SentimentResult } from '../../../services/analysis-worker/src/domain/sentiment/sentiment-scoring';
import { ReviewCreatedMessageHandler } from '../../../services/analysis-worker/src/presentation/messaging/review-created-message.handler';
import { createAnalysisWorkerConfig } from '../../support/config';
import { FakeConsumerChannel, createAmqpMessage } from '../../support/fake-amqp';

const REVIEW_CREATED = {
  event_type: 'ReviewCreated',
  review_id: 42,
  hotel_id: 7,
  title: 'Great weekend',
  content: 'Excellent stay, loved everything',
  rating: 5,
};

function createHandler(options: { failCompleted?: boolean } = {}) {
  const completed: AnalysisCompletedMessage[] = [];
  const publisher: AnalysisEventsPublisherPort = {
    async publishAnalysisStarted() {},
    async publishAnalysisCompleted(message) {
      if (options.failCompleted) {
        throw new Error('broker unavailable');
      }
      completed.push(message);
    },
  };
  const config = createAnalysisWorkerConfig();
  const engine = new SentimentEngineService({
    async classify() {
      return { label: '5 stars', score: 0.88 };
    },
  });

  return {
    handler: new ReviewCreatedMessageHandler(new AnalyzeReviewUseCase(engine, publisher, config), config),
    completed,
  };
}

test('ReviewCreatedMessageHandler acks after publishing the result', async () => {
  const { handler, completed } = createHandler();
  const channel = new FakeConsumerChannel();
  const message = createAmqpMessage(REVIEW_CREATED);

  await handler.handle(channel, message);

  assert.deepEqual(channel.acked, [message]);
  assert.equal(channel.nacked.length, 0);
  assert.deepEqual(completed.map((item) => item.data.sentiment_score), [1]);
});

test('ReviewCreatedMessageHandler dead-letters malformed JSON and invalid reviews', async () => {
  const { handler, completed } = createHandler();
  const channel = new FakeConsumerChannel();
  const malformed = createAmqpMessage('{"event_type":');
  const invalid = createAmqpMessage({ ...REVIEW_CREATED, rating: 9 });

  await handler.handle(channel, malformed);
  await handler.handle(channel, invalid);

  assert.deepEqual(channel.nacked, [
    { message: malformed, allUpTo: false, requeue: false },
    { message: invalid, allUpTo: false, requeue: false },
  ]);
  assert.equal(channel.acked.length, 0);
  assert.equal(completed.length, 0);
});

test('ReviewCreatedMessageHandler acks unknown event types without analyzing', async () => {
  const { handler, completed } = createHandler();
  const channel = new FakeConsumerChannel();
  const message = createAmqpMessage({ event_type: 'ReviewDeleted', review_id: 42 });

  await handler.handle(channel, message);

  assert.deepEqual(channel.acked, [message]);
  assert.equal(completed.length, 0);
});

test('ReviewCreatedMessageHandler schedules a retry when the result cannot be published', async () => {
  const { handler } = createHandler({ failCompleted: true });
  const channel = new FakeConsumerChannel();
  const message = createAmqpMessage(REVIEW_CREATED);

  await handler.handle(channel, message);

  assert.deepEqual(channel.acked, [message]);
  assert.equal(channel.published.length, 1);
  assert.equal(channel.published[0]?.exchange, '');
  assert.equal(channel.published[0]?.routingKey, 'review.created.retry.1000');
});

test('ReviewCreatedMessageHandler parks the review after the last attempt', async () => {
  const { handler } = createHandler({ failCompleted: true });
  const channel = new FakeConsumerChannel();
  const message = createAmqpMessage(REVIEW_CREATED, { headers: { 'x-retry-attempt': 4 } });

  await handler.handle(channel, message);

  assert.equal(channel.published[0]?.exchange, 'review-pipeline.dlx');
  assert.equal(channel.published[0]?.routingKey, 'review.created.dlq');
  assert.equal(channel.published[0]?.options?.headers?.['x-parked-reason'], 'result-publish-failed');
  assert.deepEqual(channel.acked, [message]);
});

test('ReviewCreatedMessageHandler dead-letters unexpected failures', async () => {
  const config = createAnalysisWorkerConfig();
  const publisher: AnalysisEventsPublisherPort = {
    async publishAnalysisStarted() {},
    async publishAnalysisCompleted() {},
  };

  class ExplodingAnalyzeReviewUseCase extends AnalyzeReviewUseCase {
    override async execute(): Promise<SentimentResult> {
      throw new TypeError('unexpected');
    }
  }

  const engine = new SentimentEngineService({
    async classify() {
      return { label: '5 stars', score: 1 };
    },
  });
  const handler = new ReviewCreatedMessageHandler(
    new ExplodingAnalyzeReviewUseCase(engine, publisher, config),
    config,
  );
  const channel = new FakeConsumerChannel();
  const message = createAmqpMessage(REVIEW_CREATED);

  await handler.handle(channel, message);

  assert.deepEqual(channel.nacked, [{ message, allUpTo: false, requeue: false }]);
  assert.equal(channel.acked.length, 0);
  assert.equal(channel.published.length, 0);
});
