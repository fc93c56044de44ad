import test from 'node:test';
import assert from 'node:assert/strict';
import {
  MAX_ANALYZED_CONTENT_LENGTH,
  labelForScore,
  roundScore,
  scoreFromPrediction,
  scoreFromRating,
  starLabelToScore,
  truncateForAnalysis,
} from '../../../services/analysis-worker/src/domain/sentiment/sentiment-scoring';

test('scoreFromRating maps the star rating onto [-1, 1]', () => {
  assert.deepEqual(scoreFromRating(1), { score: -1, label: 'negative', source: 'rating-fallback' });
  assert.deepEqual(scoreFromRating(2), { score: -0.5, label: 'negative', source: 'rating-fallback' });
  assert.deepEqual(scoreFromRating(3), { score: 0, label: 'neutral', source: 'rating-fallback' });
  assert.deepEqual(scoreFromRating(4), { score: 0.5, label: 'positive', source: 'rating-fallback' });
  assert.deepEqual(scoreFromRating(5), { score: 1, label: 'positive', source: 'rating-fallback' });
});

test('scoreFromPrediction weighs the model 60/40 against the rating', () => {
  assert.deepEqual(scoreFromPrediction('5 stars', 5), { score: 1, label: 'positive', source: 'model' });
  assert.deepEqual(scoreFromPrediction('5 stars', 1), { score: 0.2, label: 'neutral', source: 'model' });
  assert.deepEqual(scoreFromPrediction('1 star', 2), { score: -0.8, label: 'negative', source: 'model' });
});

test('scoreFromPrediction keeps exact thresholds neutral', () => {
  assert.deepEqual(scoreFromPrediction('4 stars', 3), { score: 0.3, label: 'neutral', source: 'model' });
  assert.equal(labelForScore(-0.3), 'neutral');
  assert.equal(labelForScore(-0.301), 'negative');
});

test('starLabelToScore is case-insensitive and scores unknown labels as neutral', () => {
  assert.equal(starLabelToScore(' 5 STARS '), 1);
  assert.equal(starLabelToScore('2 stars'), -0.5);
  assert.equal(starLabelToScore('LABEL_0'), 0);
  assert.deepEqual(scoreFromPrediction('LABEL_0', 3), { score: 0, label: 'neutral', source: 'model' });
});

test('roundScore keeps three decimals and never returns negative zero', () => {
  assert.equal(roundScore(0.12345), 0.123);
  assert.ok(Object.is(roundScore(-0.0004), 0));
});

test('truncateForAnalysis caps the analyzed text', () => {
  const long = 'a'.repeat(600);

  assert.equal(truncateForAnalysis(long).length, MAX_ANALYZED_CONTENT_LENGTH);
  assert.equal(truncateForAnalysis('Lovely staff'), 'Lovely staff');
});
