import { once, type EventEmitter } from 'node:events';
import * as amqp from 'amqplib';
import type { LineLogger } from '../logging/json-log';
import { JSON_CONTENT_TYPE, PERSISTENT_DELIVERY_MODE } from '../standards';
import type { RabbitMqPublishOptions } from './rabbitmq-consumer';
import { assertReviewPipelineTopology, type RabbitMqTopologyChannelLike } from './topology';

export interface RabbitMqPublishChannelLike extends RabbitMqTopologyChannelLike, EventEmitter {
  publish(
    exchange: string,
    routingKey: string,
    content: Buffer,
    options?: RabbitMqPublishOptions,
  ): boolean;
  waitForConfirms(): Promise<void>;
  close(): Promise<void>;
}

export interface RabbitMqConnectionLike {
  createConfirmChannel(): Promise<RabbitMqPublishChannelLike>;
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  close(): Promise<void>;
}

export interface RabbitMqPublisherConnectionOptions {
  url: string;
  logger: LineLogger;
  setupChannel?: (channel: RabbitMqPublishChannelLike) => Promise<void>;
  connect?: (url: string) => Promise<RabbitMqConnectionLike>;
}

export interface PublishJsonInput {
  exchange: string;
  routingKey: string;
  body: unknown;
  messageId: string;
  correlationId: string;
  causationId?: string;
  type: string;
}

/**
 * Confirm-channel publisher with a lazily (re)opened connection. Topology is asserted once per
 * channel; any close, error or failed publish drops the cached channel so the next call reconnects.
 * After `close()` the connection stays closed and every publish rejects.
 */
export class RabbitMqPublisherConnection {
  private closed = false;
  private connection?: RabbitMqConnectionLike;
  private channel?: RabbitMqPublishChannelLike;
  private channelPromise?: Promise<RabbitMqPublishChannelLike>;
  private readonly connect: (url: string) => Promise<RabbitMqConnectionLike>;
  private readonly setupChannel: (channel: RabbitMqPublishChannelLike) => Promise<void>;

  constructor(private readonly options: RabbitMqPublisherConnectionOptions) {
    this.connect = options.connect ?? ((url) => amqp.connect(url));
    this.setupChannel = options.setupChannel ?? assertReviewPipelineTopology;
  }

  get isOpen(): boolean {
    return this.channel !== undefined;
  }

  async open(): Promise<void> {
    await this.getChannel();
  }

  async publishJson(input: PublishJsonInput): Promise<void> {
    const channel = await this.getChannel();
    const payload = Buffer.from(JSON.stringify(input.body));

    try {
      const published = channel.publish(input.exchange, input.routingKey, payload, {
        contentType: JSON_CONTENT_TYPE,
        contentEncoding: 'utf-8',
        deliveryMode: PERSISTENT_DELIVERY_MODE,
        timestamp: Date.now(),
        messageId: input.messageId,
        type: input.type,
        correlationId: input.correlationId,
        headers: {
          causationId: input.causationId ?? '',
        },
      });

      if (!published) {
        await waitForDrain(channel);
      }

      await channel.waitForConfirms();
    } catch (error) {
      await this.release();
      throw error;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.release();
  }

  private async release(): Promise<void> {
    const channel = this.channel;
    const connection = this.connection;
    this.channel = undefined;
    this.connection = undefined;

    try {
      if (channel) {
        await channel.close();
      }
    } catch {
      // ignore on shutdown
    }

    try {
      if (connection) {
        await connection.close();
      }
    } catch {
      // ignore on shutdown
    }
  }

  private async getChannel(): Promise<RabbitMqPublishChannelLike> {
    if (this.closed) {
      throw new Error('AMQP publisher connection is closed.');
    }

    if (this.channel) {
      return this.channel;
    }

    if (!this.channelPromise) {
      this.channelPromise = this.createChannel();
    }

    try {
      return await this.channelPromise;
    } finally {
      this.channelPromise = undefined;
    }
  }

  private async createChannel(): Promise<RabbitMqPublishChannelLike> {
    const logger = this.options.logger;
    const connection = await this.connect(this.options.url);

    connection.on('error', (error: unknown) => {
      logger.error(`AMQP connection error: ${describeError(error)}`);
    });
    connection.on('close', () => {
      if (this.connection === connection) {
        logger.warn('AMQP connection closed for publisher.');
        this.connection = undefined;
        this.channel = undefined;
      }
    });

    let channel: RabbitMqPublishChannelLike;
    try {
      channel = await connection.createConfirmChannel();
      await this.setupChannel(channel);
      if (this.closed) {
        throw new Error('AMQP publisher connection was closed while opening.');
      }
    } catch (error) {
      await connection.close().catch((closeError: unknown) => {
        logger.warn(`Failed to close AMQP connection after setup error: ${describeError(closeError)}`);
      });
      throw error;
    }

    channel.on('error', (error: unknown) => {
      logger.error(`AMQP channel error: ${describeError(error)}`);
    });
    channel.on('close', () => {
      if (this.channel === channel) {
        logger.warn('AMQP channel closed for publisher.');
        // release() never rejects; the connection goes with its channel.
        void this.release();
      }
    });

    this.connection = connection;
    this.channel = channel;
    return channel;
  }
}

// Rejects when the channel errors or closes before draining; the caller then drops the channel.
async function waitForDrain(channel: RabbitMqPublishChannelLike): Promise<void> {
  const abort = new AbortController();

  try {
    await Promise.race([
      once(channel, 'drain', { signal: abort.signal }),
      once(channel, 'close', { signal: abort.signal }).then(() => {
        throw new Error('AMQP channel closed while waiting for drain.');
      }),
    ]);
  } finally {
    abort.abort();
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
