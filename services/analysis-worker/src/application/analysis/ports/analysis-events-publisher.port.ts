import type {
  AnalysisCompletedMessage,
  AnalysisStartedMessage,
  MessageTrace,
} from '@hotel-reviews/shared';

export const ANALYSIS_EVENTS_PUBLISHER_PORT = Symbol('ANALYSIS_EVENTS_PUBLISHER_PORT');

export interface AnalysisEventsPublisherPort {
  publishAnalysisStarted(message: AnalysisStartedMessage, trace: MessageTrace): Promise<void>;
  publishAnalysisCompleted(message: AnalysisCompletedMessage, trace: MessageTrace): Promise<void>;
}
