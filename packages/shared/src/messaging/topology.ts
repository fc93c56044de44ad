import {
  DEFAULT_EXCHANGE,
  PIPELINE_DEAD_LETTER_EXCHANGE,
  PIPELINE_QUEUES,
  deadLetterQueueFor,
  retryQueueFor,
  type PipelineQueueName,
} from '../standards';
import { retryDelayTiersMs, type RetrySchedule } from './retry-schedule';

export interface RabbitMqQueueOptions {
  durable?: boolean;
  messageTtl?: number;
  deadLetterExchange?: string;
  deadLetterRoutingKey?: string;
}

export interface RabbitMqTopologyChannelLike {
  assertExchange(exchange: string, type: string, options?: { durable?: boolean }): Promise<unknown>;
  assertQueue(queue: string, options?: RabbitMqQueueOptions): Promise<unknown>;
  bindQueue(queue: string, source: string, pattern: string): Promise<unknown>;
}

export interface QueueDeclaration {
  queue: string;
  options: RabbitMqQueueOptions;
  bindTo?: { exchange: string; routingKey: string };
}

/**
 * Every participant declares the same arguments; RabbitMQ refuses a redeclaration that differs.
 */
export function describePipelineQueue(queue: PipelineQueueName): QueueDeclaration[] {
  const deadLetterQueue = deadLetterQueueFor(queue);

  return [
    {
      queue,
      options: {
        durable: true,
        deadLetterExchange: PIPELINE_DEAD_LETTER_EXCHANGE,
        deadLetterRoutingKey: deadLetterQueue,
      },
    },
    {
      queue: deadLetterQueue,
      options: { durable: true },
      bindTo: { exchange: PIPELINE_DEAD_LETTER_EXCHANGE, routingKey: deadLetterQueue },
    },
  ];
}

/**
 * One TTL queue per backoff delay. Expired messages dead-letter through the default exchange
 * back to the queue they came from. Only the consumer of `queue` publishes here, so it alone
 * declares them, from its own schedule.
 */
export function describeRetryQueues(queue: PipelineQueueName, schedule: RetrySchedule): QueueDeclaration[] {
  return retryDelayTiersMs(schedule).map((delayMs) => ({
    queue: retryQueueFor(queue, delayMs),
    options: {
      durable: true,
      messageTtl: delayMs,
      deadLetterExchange: DEFAULT_EXCHANGE,
      deadLetterRoutingKey: queue,
    },
  }));
}

export async function assertReviewPipelineTopology(channel: RabbitMqTopologyChannelLike): Promise<void> {
  await channel.assertExchange(PIPELINE_DEAD_LETTER_EXCHANGE, 'direct', { durable: true });

  for (const queue of Object.values(PIPELINE_QUEUES)) {
    await assertDeclarations(channel, describePipelineQueue(queue));
  }
}

export async function assertRetryQueues(
  channel: RabbitMqTopologyChannelLike,
  queue: PipelineQueueName,
  schedule: RetrySchedule,
): Promise<void> {
  await assertDeclarations(channel, describeRetryQueues(queue, schedule));
}

async function assertDeclarations(
  channel: RabbitMqTopologyChannelLike,
  declarations: QueueDeclaration[],
): Promise<void> {
  for (const declaration of declarations) {
    await channel.assertQueue(declaration.queue, declaration.options);
    if (declaration.bindTo) {
      await channel.bindQueue(declaration.queue, declaration.bindTo.exchange, declaration.bindTo.routingKey);
    }
  }
}
