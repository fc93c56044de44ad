import { randomUUID } from 'node:crypto';

export interface MessageTrace {
  correlationId: string;
  causationId?: string;
}

export function generateId(): string {
  return randomUUID();
}

export function generateCorrelationId(): string {
  return generateId();
}

export function ensureCorrelationId(correlationId?: string): string {
  return correlationId && correlationId.trim().length > 0 ? correlationId.trim() : generateCorrelationId();
}

export function createTraceIds(source?: { messageId?: string; correlationId?: string } | null): MessageTrace {
  return {
    correlationId: ensureCorrelationId(source?.correlationId),
    causationId: source?.messageId,
  };
}
