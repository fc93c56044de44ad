import type {
  LineLogger,
  RabbitMqConsumerChannelLike,
  RabbitMqConsumerMessageLike,
  RabbitMqPublishConfirmCallback,
  RabbitMqPublishOptions,
} from '../../packages/shared/src';

export interface PublishedMessage {
  exchange: string;
  routingKey: string;
  content: Buffer;
  options?: RabbitMqPublishOptions;
}

export interface NackCall {
  message: unknown;
  allUpTo?: boolean;
  requeue?: boolean;
}

/**
 * Records settlements and publishes. Confirms are delivered immediately unless `holdConfirms`
 * is set, in which case `releaseConfirms()` delivers them.
 */
export class FakeConsumerChannel implements RabbitMqConsumerChannelLike {
  readonly acked: unknown[] = [];
  readonly nacked: NackCall[] = [];
  readonly published: PublishedMessage[] = [];
  failPublish = false;
  rejectPublish = false;
  holdConfirms = false;
  private readonly heldConfirms: Array<() => void> = [];

  ack(message: unknown): void {
    this.acked.push(message);
  }

  nack(message: unknown, allUpTo?: boolean, requeue?: boolean): void {
    this.nacked.push({ message, allUpTo, requeue });
  }

  publish(
    exchange: string,
    routingKey: string,
    content: Buffer,
    options?: RabbitMqPublishOptions,
    callback?: RabbitMqPublishConfirmCallback,
  ): boolean {
    if (this.failPublish) {
      throw new Error('Channel closed');
    }
    this.published.push({ exchange, routingKey, content, options });

    const error = this.rejectPublish ? new Error('message nacked') : null;
    const confirm = () => callback?.(error);
    if (this.holdConfirms) {
      this.heldConfirms.push(confirm);
    } else {
      confirm();
    }
    return true;
  }

  releaseConfirms(): void {
    for (const confirm of this.heldConfirms.splice(0)) {
      confirm();
    }
  }
}

export function createAmqpMessage(
  body: unknown,
  options: { headers?: Record<string, unknown>; messageId?: string; correlationId?: string } = {},
): RabbitMqConsumerMessageLike {
  return {
    content: Buffer.from(typeof body === 'string' ? body : JSON.stringify(body)),
    fields: { routingKey: 'test.queue', redelivered: false },
    properties: {
      messageId: options.messageId ?? 'msg-1',
      correlationId: options.correlationId ?? 'corr-1',
      contentType: 'application/json',
      headers: options.headers ?? {},
    },
  };
}

export function createRecordingLogger(): LineLogger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    log(message: string) {
      lines.push(message);
    },
    warn(message: string) {
      lines.push(message);
    },
    error(message: string) {
      lines.push(message);
    },
  };
}
