import type { SentimentLabel } from '@hotel-reviews/shared';

export const MAX_ANALYZED_CONTENT_LENGTH = 512;

export const TEXT_WEIGHT = 0.6;
export const RATING_WEIGHT = 0.4;

export const POSITIVE_THRESHOLD = 0.3;
export const NEGATIVE_THRESHOLD = -0.3;

// Labels of the 5-class star-rating classifier.
const STAR_LABEL_SCORES = new Map<string, number>([
  ['1 star', -1],
  ['2 stars', -0.5],
  ['3 stars', 0],
  ['4 stars', 0.5],
  ['5 stars', 1],
]);

export type SentimentSource = 'model' | 'rating-fallback';

export interface SentimentResult {
  score: number;
  label: SentimentLabel;
  source: SentimentSource;
}

export function truncateForAnalysis(content: string): string {
  return content.length > MAX_ANALYZED_CONTENT_LENGTH
    ? content.slice(0, MAX_ANALYZED_CONTENT_LENGTH)
    : content;
}

/** Unknown labels score as neutral. */
export function starLabelToScore(label: string): number {
  return STAR_LABEL_SCORES.get(label.trim().toLowerCase()) ?? 0;
}

export function ratingToScore(rating: number): number {
  return (rating - 3) / 2;
}

export function roundScore(value: number): number {
  const rounded = Math.round(value * 1000) / 1000;
  // Math.round can produce -0.
  return rounded === 0 ? 0 : rounded;
}

export function labelForScore(score: number): SentimentLabel {
  if (score > POSITIVE_THRESHOLD) {
    return 'positive';
  }
  if (score < NEGATIVE_THRESHOLD) {
    return 'negative';
  }
  return 'neutral';
}

export function scoreFromPrediction(starLabel: string, rating: number): SentimentResult {
  const score = roundScore(TEXT_WEIGHT * starLabelToScore(starLabel) + RATING_WEIGHT * ratingToScore(rating));
  return { score, label: labelForScore(score), source: 'model' };
}

export function scoreFromRating(rating: number): SentimentResult {
  const score = roundScore(ratingToScore(rating));
  return { score, label: labelForScore(score), source: 'rating-fallback' };
}
