import type { ReviewAspect, SentimentLabel } from '@hotel-reviews/shared';
import type { ReviewStatus } from './review-status';

export const REVIEW_LIMITS = {
  userNameMaxLength: 100,
  userEmailMaxLength: 255,
  titleMaxLength: 200,
  contentMinLength: 10,
  minRating: 1,
  maxRating: 5,
} as const;

export interface Review {
  id: number;
  hotelId: number;
  userName: string;
  userEmail: string | null;
  rating: number;
  title: string | null;
  content: string;
  status: ReviewStatus;
  sentimentScore: number | null;
  sentimentLabel: SentimentLabel | null;
  aspects: ReviewAspect[] | null;
  topics: string[] | null;
  keyPhrases: string[] | null;
  createdAt: string;
  updatedAt: string;
}

export interface NewReview {
  hotelId: number;
  userName: string;
  userEmail: string | null;
  rating: number;
  title: string | null;
  content: string;
}

export interface ReviewAnalysisFields {
  sentimentScore: number;
  sentimentLabel: SentimentLabel;
  aspects: ReviewAspect[] | null;
  topics: string[] | null;
  keyPhrases: string[] | null;
}
