import test from 'node:test';
import assert from 'node:assert/strict';
import {
  canTransitionReviewStatus,
  isReviewStatus,
  statusesAllowingTransitionTo,
} from '../../../services/review-service/src/domain/reviews/review-status';

test('COMPLETED only accepts a re-application of the result', () => {
  assert.equal(canTransitionReviewStatus('COMPLETED', 'COMPLETED'), true);
  assert.equal(canTransitionReviewStatus('COMPLETED', 'PROCESSING'), false);
  assert.equal(canTransitionReviewStatus('COMPLETED', 'FAILED'), false);
  assert.equal(canTransitionReviewStatus('COMPLETED', 'PENDING'), false);
});

test('PENDING and FAILED reviews can move to PROCESSING', () => {
  assert.equal(canTransitionReviewStatus('PENDING', 'PROCESSING'), true);
  assert.equal(canTransitionReviewStatus('FAILED', 'PROCESSING'), true);
  assert.equal(canTransitionReviewStatus('PROCESSING', 'PROCESSING'), false);
  assert.deepEqual(statusesAllowingTransitionTo('PROCESSING'), ['PENDING', 'FAILED']);
});

test('every non-completed status can complete or fail', () => {
  assert.deepEqual(statusesAllowingTransitionTo('COMPLETED'), ['PENDING', 'PROCESSING', 'COMPLETED', 'FAILED']);
  assert.deepEqual(statusesAllowingTransitionTo('FAILED'), ['PENDING', 'PROCESSING', 'FAILED']);
  assert.deepEqual(statusesAllowingTransitionTo('PENDING'), []);
});

test('isReviewStatus matches the stored uppercase values only', () => {
  assert.equal(isReviewStatus('PROCESSING'), true);
  assert.equal(isReviewStatus('processing'), false);
  assert.equal(isReviewStatus(3), false);
});
