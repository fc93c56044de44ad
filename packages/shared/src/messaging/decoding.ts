import {
  isSentimentLabel,
  type AnalysisCompletedMessage,
  type AnalysisResultMessage,
  type AnalysisStartedMessage,
  type ReviewAspect,
  type ReviewCreatedMessage,
} from './contracts';

export type DecodeResult<TMessage> =
  | { status: 'decoded'; message: TMessage }
  | { status: 'invalid-json'; error: unknown }
  | { status: 'invalid-message'; eventType?: string; reason: string }
  | { status: 'unsupported-event'; eventType: string };

type ParseOutcome<TMessage> = { ok: true; message: TMessage } | { ok: false; reason: string };

type MessageParser<TMessage> = (record: Record<string, unknown>) => ParseOutcome<TMessage>;

const INTAKE_PARSERS = new Map<string, MessageParser<ReviewCreatedMessage>>([
  ['ReviewCreated', parseReviewCreated],
]);

const RESULT_PARSERS = new Map<string, MessageParser<AnalysisResultMessage>>([
  ['AnalysisStarted', parseAnalysisStarted],
  ['AnalysisCompleted', parseAnalysisCompleted],
]);

/** Decodes a body taken from the `review.created` queue. */
export function decodeIntakeMessage(content: Buffer | string): DecodeResult<ReviewCreatedMessage> {
  return decodeWith(content, INTAKE_PARSERS);
}

/** Decodes a body taken from the `analysis.completed` queue. */
export function decodeAnalysisResultMessage(content: Buffer | string): DecodeResult<AnalysisResultMessage> {
  return decodeWith(content, RESULT_PARSERS);
}

function decodeWith<TMessage>(
  content: Buffer | string,
  parsers: ReadonlyMap<string, MessageParser<TMessage>>,
): DecodeResult<TMessage> {
  let parsed: unknown;

  try {
    parsed = JSON.parse(typeof content === 'string' ? content : content.toString('utf-8'));
  } catch (error) {
    return { status: 'invalid-json', error };
  }

  if (!isRecord(parsed)) {
    return { status: 'invalid-message', reason: 'Message body must be a JSON object.' };
  }

  const eventType = parsed.event_type;
  if (typeof eventType !== 'string' || eventType.trim().length === 0) {
    return { status: 'invalid-message', reason: 'event_type must be a non-empty string.' };
  }

  const parser = parsers.get(eventType);
  if (!parser) {
    return { status: 'unsupported-event', eventType };
  }

  const outcome = parser(parsed);
  if (!outcome.ok) {
    return { status: 'invalid-message', eventType, reason: outcome.reason };
  }

  return { status: 'decoded', message: outcome.message };
}

function parseReviewCreated(record: Record<string, unknown>): ParseOutcome<ReviewCreatedMessage> {
  const reviewId = toPositiveInt(record.review_id);
  if (reviewId === undefined) {
    return invalid('review_id must be a positive integer.');
  }

  const hotelId = toPositiveInt(record.hotel_id);
  if (hotelId === undefined) {
    return invalid('hotel_id must be a positive integer.');
  }

  const rating = record.rating;
  if (typeof rating !== 'number' || !Number.isInteger(rating) || rating < 1 || rating > 5) {
    return invalid('rating must be an integer between 1 and 5.');
  }

  const content = record.content;
  if (typeof content !== 'string') {
    return invalid('content must be a string.');
  }

  const rawTitle = record.title;
  let title: string | null = null;
  if (typeof rawTitle === 'string') {
    title = rawTitle;
  } else if (rawTitle !== undefined && rawTitle !== null) {
    return invalid('title must be a string or null.');
  }

  return {
    ok: true,
    message: {
      event_type: 'ReviewCreated',
      review_id: reviewId,
      hotel_id: hotelId,
      title,
      content,
      rating,
    },
  };
}

function parseAnalysisStarted(record: Record<string, unknown>): ParseOutcome<AnalysisStartedMessage> {
  const reviewId = toPositiveInt(record.review_id);
  if (reviewId === undefined) {
    return invalid('review_id must be a positive integer.');
  }

  return { ok: true, message: { event_type: 'AnalysisStarted', review_id: reviewId } };
}

function parseAnalysisCompleted(record: Record<string, unknown>): ParseOutcome<AnalysisCompletedMessage> {
  const reviewId = toPositiveInt(record.review_id);
  if (reviewId === undefined) {
    return invalid('review_id must be a positive integer.');
  }

  const data = record.data;
  if (!isRecord(data)) {
    return invalid('data must be an object.');
  }

  const score = data.sentiment_score;
  if (typeof score !== 'number' || !Number.isFinite(score) || score < -1 || score > 1) {
    return invalid('data.sentiment_score must be a number between -1 and 1.');
  }

  const label = data.sentiment_label;
  if (!isSentimentLabel(label)) {
    return invalid('data.sentiment_label must be positive, negative or neutral.');
  }

  const aspects = toNullableList(data.aspects, isReviewAspect);
  if (!aspects.ok) {
    return invalid('data.aspects must be null or a list of aspects.');
  }

  const topics = toNullableList(data.topics, isString);
  if (!topics.ok) {
    return invalid('data.topics must be null or a list of strings.');
  }

  const keyPhrases = toNullableList(data.key_phrases, isString);
  if (!keyPhrases.ok) {
    return invalid('data.key_phrases must be null or a list of strings.');
  }

  return {
    ok: true,
    message: {
      event_type: 'AnalysisCompleted',
      review_id: reviewId,
      data: {
        sentiment_score: score,
        sentiment_label: label,
        aspects: aspects.value,
        topics: topics.value,
        key_phrases: keyPhrases.value,
      },
    },
  };
}

export function isReviewAspect(value: unknown): value is ReviewAspect {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    typeof value.score === 'number' &&
    Number.isFinite(value.score) &&
    isSentimentLabel(value.sentiment)
  );
}

/** Lenient reader for stored JSON columns: anything that is not a valid list reads as null. */
export function readNullableList<T>(value: unknown, guard: (item: unknown) => item is T): T[] | null {
  const list = toNullableList(value, guard);
  return list.ok ? list.value : null;
}

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function toNullableList<T>(
  value: unknown,
  guard: (item: unknown) => item is T,
): { ok: true; value: T[] | null } | { ok: false } {
  if (value === undefined || value === null) {
    return { ok: true, value: null };
  }

  if (!Array.isArray(value)) {
    return { ok: false };
  }

  const items: T[] = [];
  for (const item of value) {
    if (!guard(item)) {
      return { ok: false };
    }
    items.push(item);
  }

  return { ok: true, value: items };
}

function toPositiveInt(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : undefined;
}

function invalid(reason: string): { ok: false; reason: string } {
  return { ok: false, reason };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
