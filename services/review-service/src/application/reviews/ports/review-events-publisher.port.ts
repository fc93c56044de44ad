import type { MessageTrace, ReviewCreatedMessage } from '@hotel-reviews/shared';

export const REVIEW_EVENTS_PUBLISHER_PORT = Symbol('REVIEW_EVENTS_PUBLISHER_PORT');

export interface ReviewEventsPublisherPort {
  /** Resolves false instead of rejecting when the broker did not take the message. */
  publishReviewCreated(message: ReviewCreatedMessage, trace: MessageTrace): Promise<boolean>;
}
