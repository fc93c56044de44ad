import { createJsonLogEntry, type LogLevel } from '../logging/json-log';
import {
  DEFAULT_EXCHANGE,
  PERSISTENT_DELIVERY_MODE,
  PIPELINE_DEAD_LETTER_EXCHANGE,
  RETRY_ATTEMPT_HEADER,
  deadLetterQueueFor,
  retryQueueFor,
  type PipelineQueueName,
} from '../standards';
import { isRecord } from './decoding';
import { createTraceIds, type MessageTrace } from './ids';
import { computeRetryDelayMs, type RetrySchedule } from './retry-schedule';

export interface RabbitMqConsumerMessageLike {
  content: Buffer;
  fields: {
    routingKey?: unknown;
    redelivered?: unknown;
  };
  properties: {
    messageId?: unknown;
    correlationId?: unknown;
    type?: unknown;
    contentType?: unknown;
    headers?: unknown;
  };
}

export interface RabbitMqPublishOptions {
  persistent?: boolean;
  deliveryMode?: number;
  contentType?: string;
  contentEncoding?: string;
  messageId?: string;
  correlationId?: string;
  type?: string;
  timestamp?: number;
  expiration?: string;
  headers?: Record<string, unknown>;
}

export type RabbitMqPublishConfirmCallback = (error: unknown) => void;

export interface RabbitMqConsumerChannelLike {
  ack(message: unknown, allUpTo?: boolean): unknown;
  nack(message: unknown, allUpTo?: boolean, requeue?: boolean): unknown;
  publish(
    exchange: string,
    routingKey: string,
    content: Buffer,
    options?: RabbitMqPublishOptions,
    callback?: RabbitMqPublishConfirmCallback,
  ): boolean;
}

export interface RetryPolicyDecision {
  action: 'retry' | 'parked' | 'requeued';
  queue: PipelineQueueName;
  attempt: number;
  maxDeliveryAttempts: number;
  delayMs?: number;
  targetQueue?: string;
  error?: unknown;
}

export interface ApplyRetryPolicyInput {
  channel: RabbitMqConsumerChannelLike;
  message: RabbitMqConsumerMessageLike;
  queue: PipelineQueueName;
  schedule: RetrySchedule;
  parkingReason?: string;
  now?: () => Date;
}

/**
 * Transient failure handling. Below the attempt limit the message is copied to the retry queue
 * for its backoff delay; that queue dead-letters it back to `<queue>` when the TTL runs out.
 * At the limit it is parked in `<queue>.dlq`. The original is acked only once the broker has
 * confirmed the copy, and nacked with requeue when the copy is rejected or cannot be sent.
 */
export async function applyRabbitMqRetryPolicy(input: ApplyRetryPolicyInput): Promise<RetryPolicyDecision> {
  const attempt = getRetryAttempt(input.message) + 1;
  const maxDeliveryAttempts = Math.max(1, input.schedule.maxDeliveryAttempts);
  const now = input.now ?? (() => new Date());

  if (attempt < maxDeliveryAttempts) {
    const delayMs = computeRetryDelayMs(attempt, input.schedule.baseDelayMs, input.schedule.maxDelayMs);
    const targetQueue = retryQueueFor(input.queue, delayMs);
    const headers = copyHeaders(input.message.properties.headers);
    headers[RETRY_ATTEMPT_HEADER] = attempt;

    try {
      await publishConfirmed(input.channel, DEFAULT_EXCHANGE, targetQueue, input.message.content, {
        ...copyPublishProperties(input.message),
        headers,
      });
    } catch (error) {
      input.channel.nack(input.message, false, true);
      return { action: 'requeued', queue: input.queue, attempt, maxDeliveryAttempts, error };
    }

    input.channel.ack(input.message);
    return { action: 'retry', queue: input.queue, attempt, maxDeliveryAttempts, delayMs, targetQueue };
  }

  const targetQueue = deadLetterQueueFor(input.queue);
  const headers = copyHeaders(input.message.properties.headers);
  headers['x-parked-at'] = now().toISOString();
  headers['x-parked-from-queue'] = input.queue;
  headers['x-parked-attempt'] = attempt;
  if (input.parkingReason) {
    headers['x-parked-reason'] = input.parkingReason;
  }

  try {
    await publishConfirmed(input.channel, PIPELINE_DEAD_LETTER_EXCHANGE, targetQueue, input.message.content, {
      ...copyPublishProperties(input.message),
      headers,
    });
  } catch (error) {
    input.channel.nack(input.message, false, true);
    return { action: 'requeued', queue: input.queue, attempt, maxDeliveryAttempts, error };
  }

  input.channel.ack(input.message);
  return { action: 'parked', queue: input.queue, attempt, maxDeliveryAttempts, targetQueue };
}

/** Permanent failure: the queue's dead-letter exchange routes the message to `<queue>.dlq`. */
export function rejectPoisonMessage(
  channel: RabbitMqConsumerChannelLike,
  message: RabbitMqConsumerMessageLike,
): void {
  channel.nack(message, false, false);
}

/** Number of retries already scheduled for this message; 0 on first delivery. */
export function getRetryAttempt(message: RabbitMqConsumerMessageLike): number {
  const headers = isRecord(message.properties.headers) ? message.properties.headers : undefined;
  return toSafeNonNegativeInt(headers?.[RETRY_ATTEMPT_HEADER]);
}

export function readMessageTrace(message: RabbitMqConsumerMessageLike): MessageTrace {
  return createTraceIds({
    messageId: optionalString(message.properties.messageId),
    correlationId: optionalString(message.properties.correlationId),
  });
}

export function createRabbitMqConsumerJsonLogLine(input: {
  level: LogLevel;
  service: string;
  message: string;
  queue: string;
  amqpMessage?: RabbitMqConsumerMessageLike;
  body?: unknown;
  error?: unknown;
  metadata?: Record<string, unknown>;
}): string {
  const bodyFields = extractBodyFields(input.body);
  const amqpMessage = input.amqpMessage;

  return JSON.stringify(
    createJsonLogEntry({
      level: input.level,
      service: input.service,
      message: input.message,
      correlationId: optionalString(amqpMessage?.properties.correlationId) ?? 'unknown',
      messageId: optionalString(amqpMessage?.properties.messageId),
      causationId: amqpMessage ? readCausationHeader(amqpMessage) : undefined,
      messageType: bodyFields.eventType ?? optionalString(amqpMessage?.properties.type),
      routingKey: optionalString(amqpMessage?.fields.routingKey),
      queue: input.queue,
      reviewId: bodyFields.reviewId,
      hotelId: bodyFields.hotelId,
      metadata: input.metadata,
      error: input.error,
    }),
  );
}

function extractBodyFields(body: unknown): { eventType?: string; reviewId?: number; hotelId?: number } {
  if (!isRecord(body)) {
    return {};
  }

  return {
    eventType: optionalString(body.event_type),
    reviewId: typeof body.review_id === 'number' ? body.review_id : undefined,
    hotelId: typeof body.hotel_id === 'number' ? body.hotel_id : undefined,
  };
}

function readCausationHeader(message: RabbitMqConsumerMessageLike): string | undefined {
  const headers = isRecord(message.properties.headers) ? message.properties.headers : undefined;
  return optionalString(headers?.causationId);
}

// Resolves on the broker's ack for the copy; rejects on its nack or a synchronous channel failure.
function publishConfirmed(
  channel: RabbitMqConsumerChannelLike,
  exchange: string,
  routingKey: string,
  content: Buffer,
  options: RabbitMqPublishOptions,
): Promise<void> {
  return new Promise((resolve, reject) => {
    channel.publish(exchange, routingKey, content, options, (error) => {
      if (error === null || error === undefined) {
        resolve();
        return;
      }
      reject(error instanceof Error ? error : new Error(`Broker rejected the message: ${String(error)}`));
    });
  });
}

function copyPublishProperties(message: RabbitMqConsumerMessageLike): RabbitMqPublishOptions {
  return {
    deliveryMode: PERSISTENT_DELIVERY_MODE,
    contentType: optionalString(message.properties.contentType),
    messageId: optionalString(message.properties.messageId),
    correlationId: optionalString(message.properties.correlationId),
    type: optionalString(message.properties.type),
  };
}

function copyHeaders(value: unknown): Record<string, unknown> {
  if (!isRecord(value)) {
    return {};
  }
  return { ...value };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function toSafeNonNegativeInt(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
    return Math.trunc(value);
  }

  if (typeof value === 'bigint' && value > 0n) {
    return Number(value);
  }

  const parsed = Number.parseInt(String(value ?? ''), 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return 0;
  }

  return parsed;
}
