import * as amqp from 'amqplib';
import type { LineLogger } from '../logging/json-log';
import { CONSUMER_PREFETCH, type PipelineQueueName } from '../standards';
import type { RabbitMqConsumerChannelLike, RabbitMqConsumerMessageLike } from './rabbitmq-consumer';
import { describeError } from './rabbitmq-publisher-connection';
import type { RetrySchedule } from './retry-schedule';
import {
  assertRetryQueues,
  assertReviewPipelineTopology,
  type RabbitMqTopologyChannelLike,
} from './topology';

export type RabbitMqMessageHandler = (
  channel: RabbitMqConsumerChannelLike,
  message: RabbitMqConsumerMessageLike,
) => Promise<void>;

export interface RabbitMqConsumeChannelLike extends RabbitMqTopologyChannelLike, RabbitMqConsumerChannelLike {
  prefetch(count: number): Promise<unknown>;
  consume(
    queue: string,
    onMessage: (message: RabbitMqConsumerMessageLike | null) => void,
  ): Promise<{ consumerTag: string }>;
  cancel(consumerTag: string): Promise<unknown>;
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  close(): Promise<void>;
}

export interface RabbitMqConsumeConnectionLike {
  createConfirmChannel(): Promise<RabbitMqConsumeChannelLike>;
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  close(): Promise<void>;
}

export interface RabbitMqQueueConsumerOptions {
  url: string;
  queue: PipelineQueueName;
  logger: LineLogger;
  reconnectDelayMs: number;
  retrySchedule: RetrySchedule;
  handle: RabbitMqMessageHandler;
  connect?: (url: string) => Promise<RabbitMqConsumeConnectionLike>;
}

/**
 * Long-running receive loop for one pipeline queue: prefetch 1, no internal concurrency.
 * Reconnects after `reconnectDelayMs` when the broker is unreachable or drops the connection.
 * The channel is a confirm channel so retry copies are acked by the broker before the original.
 */
export class RabbitMqQueueConsumer {
  private connection?: RabbitMqConsumeConnectionLike;
  private channel?: RabbitMqConsumeChannelLike;
  private consumerTag?: string;
  private reconnectTimer?: NodeJS.Timeout;
  private pendingAttempt?: Promise<void>;
  private stopping = false;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly connect: (url: string) => Promise<RabbitMqConsumeConnectionLike>;

  constructor(private readonly options: RabbitMqQueueConsumerOptions) {
    this.connect = options.connect ?? ((url) => amqp.connect(url));
  }

  async start(): Promise<void> {
    this.stopping = false;
    await this.attemptConnection();
  }

  /** Stops accepting deliveries, waits for in-flight handlers, then closes channel and connection. */
  async stop(): Promise<void> {
    this.stopping = true;

    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }

    await this.pendingAttempt;

    const channel = this.channel;
    const consumerTag = this.consumerTag;
    this.consumerTag = undefined;

    try {
      if (channel && consumerTag) {
        await channel.cancel(consumerTag);
      }
    } catch {
      // ignore shutdown errors
    }

    await Promise.all(Array.from(this.inFlight));
    await this.releaseConnection();
  }

  private attemptConnection(): Promise<void> {
    const attempt = this.connectOrScheduleReconnect();
    this.pendingAttempt = attempt;
    return attempt;
  }

  private async connectOrScheduleReconnect(): Promise<void> {
    try {
      await this.connectAndConsume();
    } catch (error) {
      this.options.logger.error(
        `Failed to start consumer for queue "${this.options.queue}": ${describeError(error)}`,
      );
      await this.releaseConnection();
      this.scheduleReconnect();
    }
  }

  private async connectAndConsume(): Promise<void> {
    const { queue, logger } = this.options;
    const connection = await this.connect(this.options.url);
    this.connection = connection;
    if (await this.releaseIfStopping()) {
      return;
    }

    connection.on('error', (error: unknown) => {
      logger.error(`AMQP connection error: ${describeError(error)}`);
    });
    connection.on('close', () => {
      if (this.connection === connection) {
        this.handleConnectionLoss(`AMQP connection closed for queue "${queue}".`);
      }
    });

    const channel = await connection.createConfirmChannel();
    this.channel = channel;
    if (await this.releaseIfStopping()) {
      return;
    }

    channel.on('error', (error: unknown) => {
      logger.error(`AMQP channel error: ${describeError(error)}`);
    });
    channel.on('close', () => {
      if (this.channel === channel) {
        this.handleConnectionLoss(`AMQP channel closed for queue "${queue}".`);
      }
    });

    await assertReviewPipelineTopology(channel);
    await assertRetryQueues(channel, queue, this.options.retrySchedule);
    await channel.prefetch(CONSUMER_PREFETCH);
    if (await this.releaseIfStopping()) {
      return;
    }

    const consumed = await channel.consume(queue, (message) => {
      if (!message) {
        this.handleConnectionLoss(`Consumer for queue "${queue}" was cancelled by the broker.`);
        return;
      }
      if (this.stopping) {
        this.requeue(channel, message);
        return;
      }
      this.track(this.dispatch(channel, message));
    });

    this.consumerTag = consumed.consumerTag;
    if (await this.releaseIfStopping()) {
      return;
    }
    logger.log(`Consuming messages from queue "${queue}" with prefetch=${CONSUMER_PREFETCH}.`);
  }

  private async releaseIfStopping(): Promise<boolean> {
    if (!this.stopping) {
      return false;
    }

    this.consumerTag = undefined;
    await this.releaseConnection();
    return true;
  }

  private async dispatch(channel: RabbitMqConsumeChannelLike, message: RabbitMqConsumerMessageLike): Promise<void> {
    try {
      await this.options.handle(channel, message);
    } catch (error) {
      // Handlers settle their own deliveries; reaching this means the channel is gone and the
      // broker will redeliver.
      this.options.logger.error(
        `Unhandled error while processing a message from "${this.options.queue}": ${describeError(error)}`,
      );
    }
  }

  private requeue(channel: RabbitMqConsumeChannelLike, message: RabbitMqConsumerMessageLike): void {
    try {
      channel.nack(message, false, true);
    } catch (error) {
      this.options.logger.warn(
        `Could not requeue a delivery on "${this.options.queue}" during shutdown: ${describeError(error)}`,
      );
    }
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    void task.then(() => {
      this.inFlight.delete(task);
    });
  }

  private handleConnectionLoss(reason: string): void {
    if (this.stopping) {
      return;
    }

    this.options.logger.warn(reason);
    this.consumerTag = undefined;
    void this.releaseConnection().then(() => this.scheduleReconnect());
  }

  private scheduleReconnect(): void {
    if (this.stopping || this.reconnectTimer) {
      return;
    }

    const delayMs = this.options.reconnectDelayMs;
    this.options.logger.log(`Reconnecting consumer for queue "${this.options.queue}" in ${delayMs}ms.`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      void this.attemptConnection();
    }, delayMs);
  }

  private async releaseConnection(): Promise<void> {
    const channel = this.channel;
    const connection = this.connection;
    this.channel = undefined;
    this.connection = undefined;

    try {
      if (channel) {
        await channel.close();
      }
    } catch {
      // ignore shutdown errors
    }

    try {
      if (connection) {
        await connection.close();
      }
    } catch {
      // ignore shutdown errors
    }
  }
}
