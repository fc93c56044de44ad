import test from 'node:test';
import assert from 'node:assert/strict';
import {
  applyRabbitMqRetryPolicy,
  computeRetryDelayMs,
  createRabbitMqConsumerJsonLogLine,
  getRetryAttempt,
  readMessageTrace,
  rejectPoisonMessage,
  retryDelayTiersMs,
} from '../../../packages/shared/src';
import { FakeConsumerChannel, createAmqpMessage } from '../../support/fake-amqp';

const BODY = { event_type: 'ReviewCreated', review_id: 42, hotel_id: 7 };

function retryInput(channel: FakeConsumerChannel, headers: Record<string, unknown> = {}) {
  return {
    channel,
    message: createAmqpMessage(BODY, { headers }),
    queue: 'review.created' as const,
    schedule: { maxDeliveryAttempts: 5, baseDelayMs: 1000, maxDelayMs: 60_000 },
    parkingReason: 'result-publish-failed',
    now: () => new Date('2026-03-01T10:00:00.000Z'),
  };
}

test('computeRetryDelayMs doubles per attempt and caps at the maximum', () => {
  assert.equal(computeRetryDelayMs(1, 1000, 60_000), 1000);
  assert.equal(computeRetryDelayMs(2, 1000, 60_000), 2000);
  assert.equal(computeRetryDelayMs(3, 1000, 60_000), 4000);
  assert.equal(computeRetryDelayMs(10, 1000, 60_000), 60_000);
});

test('retryDelayTiersMs lists one distinct delay per retryable attempt', () => {
  assert.deepEqual(retryDelayTiersMs({ maxDeliveryAttempts: 5, baseDelayMs: 1000, maxDelayMs: 60_000 }), [
    1000, 2000, 4000, 8000,
  ]);
  assert.deepEqual(retryDelayTiersMs({ maxDeliveryAttempts: 6, baseDelayMs: 1000, maxDelayMs: 3000 }), [
    1000, 2000, 3000,
  ]);
  assert.deepEqual(retryDelayTiersMs({ maxDeliveryAttempts: 1, baseDelayMs: 1000, maxDelayMs: 60_000 }), []);
});

test('applyRabbitMqRetryPolicy schedules the first retry through the retry queue for its delay', async () => {
  const channel = new FakeConsumerChannel();
  const input = retryInput(channel);

  const decision = await applyRabbitMqRetryPolicy(input);

  assert.deepEqual(decision, {
    action: 'retry',
    queue: 'review.created',
    attempt: 1,
    maxDeliveryAttempts: 5,
    delayMs: 1000,
    targetQueue: 'review.created.retry.1000',
  });
  assert.equal(channel.published.length, 1);
  const published = channel.published[0];
  assert.equal(published?.exchange, '');
  assert.equal(published?.routingKey, 'review.created.retry.1000');
  assert.equal(published?.options?.expiration, undefined);
  assert.equal(published?.options?.deliveryMode, 2);
  assert.equal(published?.options?.correlationId, 'corr-1');
  assert.equal(published?.options?.messageId, 'msg-1');
  assert.deepEqual(published?.options?.headers, { 'x-retry-attempt': 1 });
  assert.deepEqual(JSON.parse(published?.content.toString('utf-8') ?? ''), BODY);
  assert.deepEqual(channel.acked, [input.message]);
  assert.equal(channel.nacked.length, 0);
});

test('applyRabbitMqRetryPolicy backs off using the attempt header', async () => {
  const channel = new FakeConsumerChannel();

  const decision = await applyRabbitMqRetryPolicy(retryInput(channel, { 'x-retry-attempt': 3, causationId: 'evt-1' }));

  assert.equal(decision.action, 'retry');
  assert.equal(decision.attempt, 4);
  assert.equal(decision.delayMs, 8000);
  assert.equal(channel.published[0]?.routingKey, 'review.created.retry.8000');
  assert.deepEqual(channel.published[0]?.options?.headers, { 'x-retry-attempt': 4, causationId: 'evt-1' });
});

test('applyRabbitMqRetryPolicy parks the message once attempts are exhausted', async () => {
  const channel = new FakeConsumerChannel();
  const input = retryInput(channel, { 'x-retry-attempt': 4 });

  const decision = await applyRabbitMqRetryPolicy(input);

  assert.deepEqual(decision, {
    action: 'parked',
    queue: 'review.created',
    attempt: 5,
    maxDeliveryAttempts: 5,
    targetQueue: 'review.created.dlq',
  });
  const published = channel.published[0];
  assert.equal(published?.exchange, 'review-pipeline.dlx');
  assert.equal(published?.routingKey, 'review.created.dlq');
  assert.equal(published?.options?.expiration, undefined);
  assert.deepEqual(published?.options?.headers, {
    'x-retry-attempt': 4,
    'x-parked-at': '2026-03-01T10:00:00.000Z',
    'x-parked-from-queue': 'review.created',
    'x-parked-attempt': 5,
    'x-parked-reason': 'result-publish-failed',
  });
  assert.deepEqual(channel.acked, [input.message]);
});

test('applyRabbitMqRetryPolicy requeues the delivery when the copy cannot be published', async () => {
  const channel = new FakeConsumerChannel();
  channel.failPublish = true;
  const input = retryInput(channel);

  const decision = await applyRabbitMqRetryPolicy(input);

  assert.equal(decision.action, 'requeued');
  assert.equal(decision.attempt, 1);
  assert.ok(decision.error instanceof Error);
  assert.equal(channel.acked.length, 0);
  assert.deepEqual(channel.nacked, [{ message: input.message, allUpTo: false, requeue: true }]);
});

test('applyRabbitMqRetryPolicy requeues the delivery when the broker rejects the copy', async () => {
  const channel = new FakeConsumerChannel();
  channel.rejectPublish = true;
  const input = retryInput(channel, { 'x-retry-attempt': 4 });

  const decision = await applyRabbitMqRetryPolicy(input);

  assert.equal(decision.action, 'requeued');
  assert.equal(decision.attempt, 5);
  assert.ok(decision.error instanceof Error);
  assert.equal(decision.error.message, 'message nacked');
  assert.equal(channel.published.length, 1);
  assert.equal(channel.acked.length, 0);
  assert.deepEqual(channel.nacked, [{ message: input.message, allUpTo: false, requeue: true }]);
});

test('applyRabbitMqRetryPolicy acks the original only after the copy is confirmed', async () => {
  const channel = new FakeConsumerChannel();
  channel.holdConfirms = true;
  const input = retryInput(channel);

  const pending = applyRabbitMqRetryPolicy(input);
  await new Promise<void>((resolve) => setImmediate(resolve));

  assert.equal(channel.published.length, 1);
  assert.equal(channel.acked.length, 0);

  channel.releaseConfirms();
  const decision = await pending;

  assert.equal(decision.action, 'retry');
  assert.deepEqual(channel.acked, [input.message]);
  assert.equal(channel.nacked.length, 0);
});

test('rejectPoisonMessage nacks without requeue', () => {
  const channel = new FakeConsumerChannel();
  const message = createAmqpMessage('{broken');

  rejectPoisonMessage(channel, message);

  assert.deepEqual(channel.nacked, [{ message, allUpTo: false, requeue: false }]);
});

test('getRetryAttempt tolerates missing and non-numeric headers', () => {
  assert.equal(getRetryAttempt(createAmqpMessage(BODY)), 0);
  assert.equal(getRetryAttempt(createAmqpMessage(BODY, { headers: { 'x-retry-attempt': '2' } })), 2);
  assert.equal(getRetryAttempt(createAmqpMessage(BODY, { headers: { 'x-retry-attempt': 'soon' } })), 0);
});

test('readMessageTrace keeps the correlation id and uses the message id as causation', () => {
  const trace = readMessageTrace(createAmqpMessage(BODY, { messageId: 'msg-9', correlationId: 'corr-9' }));

  assert.deepEqual(trace, { correlationId: 'corr-9', causationId: 'msg-9' });
});

test('createRabbitMqConsumerJsonLogLine lifts trace and review fields into the entry', () => {
  const line = createRabbitMqConsumerJsonLogLine({
    level: 'error',
    service: 'analysis-worker',
    message: 'failed',
    queue: 'review.created',
    amqpMessage: createAmqpMessage(BODY, { headers: { causationId: 'evt-0' } }),
    body: BODY,
    metadata: { retryAction: 'retry' },
  });

  const entry: unknown = JSON.parse(line);
  assert.ok(typeof entry === 'object' && entry !== null);
  assert.deepEqual({ ...entry, timestamp: 'ts' }, {
    timestamp: 'ts',
    level: 'error',
    service: 'analysis-worker',
    message: 'failed',
    correlationId: 'corr-1',
    causationId: 'evt-0',
    messageId: 'msg-1',
    messageType: 'ReviewCreated',
    routingKey: 'test.queue',
    queue: 'review.created',
    reviewId: 42,
    hotelId: 7,
    metadata: { retryAction: 'retry' },
  });
});
