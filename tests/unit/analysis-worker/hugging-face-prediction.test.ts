import test from 'node:test';
import assert from 'node:assert/strict';
import {
  HuggingFaceSentimentModelAdapter,
  SentimentModelError,
  parseStarRatingPrediction,
} from '../../../services/analysis-worker/src/infrastructure/sentiment/hugging-face-sentiment-model.adapter';
import { createAnalysisWorkerConfig } from '../../support/config';

interface CapturedRequest {
  url: string;
  init?: RequestInit;
}

async function withFetch<T>(
  handler: (request: CapturedRequest) => Response,
  run: (requests: CapturedRequest[]) => Promise<T>,
): Promise<T> {
  const original = globalThis.fetch;
  const requests: CapturedRequest[] = [];

  globalThis.fetch = async (input: string | URL | Request, init?: RequestInit) => {
    const request = { url: input instanceof Request ? input.url : String(input), init };
    requests.push(request);
    return handler(request);
  };

  try {
    return await run(requests);
  } finally {
    globalThis.fetch = original;
  }
}

test('parseStarRatingPrediction picks the top label from a batched response', () => {
  const prediction = parseStarRatingPrediction([
    [
      { label: '1 star', score: 0.01 },
      { label: '4 stars', score: 0.32 },
      { label: '5 stars', score: 0.61 },
    ],
  ]);

  assert.deepEqual(prediction, { label: '5 stars', score: 0.61 });
});

test('parseStarRatingPrediction accepts a flat list and skips malformed entries', () => {
  const prediction = parseStarRatingPrediction([
    { label: '2 stars', score: 'high' },
    null,
    { label: '3 stars', score: 0.4 },
    { score: 0.9 },
  ]);

  assert.deepEqual(prediction, { label: '3 stars', score: 0.4 });
});

test('parseStarRatingPrediction returns undefined without a usable prediction', () => {
  assert.equal(parseStarRatingPrediction({ error: 'Model is loading' }), undefined);
  assert.equal(parseStarRatingPrediction([]), undefined);
  assert.equal(parseStarRatingPrediction([[]]), undefined);
});

test('HuggingFaceSentimentModelAdapter posts the text with the configured token', async () => {
  const adapter = new HuggingFaceSentimentModelAdapter(
    createAnalysisWorkerConfig({
      SENTIMENT_MODEL_URL: 'http://model.test/classify',
      SENTIMENT_MODEL_API_TOKEN: 'test-token',
    }),
  );

  const prediction = await withFetch(
    () => new Response(JSON.stringify([[{ label: '4 stars', score: 0.7 }]]), { status: 200 }),
    async (requests) => {
      const result = await adapter.classify('Quiet room');
      assert.equal(requests.length, 1);
      assert.equal(requests[0]?.url, 'http://model.test/classify');
      assert.equal(requests[0]?.init?.method, 'POST');
      assert.equal(requests[0]?.init?.body, '{"inputs":"Quiet room"}');
      assert.deepEqual(requests[0]?.init?.headers, {
        'content-type': 'application/json',
        accept: 'application/json',
        authorization: 'Bearer test-token',
      });
      assert.equal(requests[0]?.init?.signal, undefined);
      return result;
    },
  );

  assert.deepEqual(prediction, { label: '4 stars', score: 0.7 });
});

test('HuggingFaceSentimentModelAdapter rejects on HTTP errors and unusable bodies', async () => {
  const adapter = new HuggingFaceSentimentModelAdapter(
    createAnalysisWorkerConfig({ SENTIMENT_MODEL_URL: 'http://model.test/classify' }),
  );

  await withFetch(
    () => new Response('busy', { status: 503 }),
    async () => {
      await assert.rejects(adapter.classify('Quiet room'), (error: unknown) => {
        assert.ok(error instanceof SentimentModelError);
        assert.equal(error.message, 'Sentiment model responded with HTTP 503.');
        return true;
      });
    },
  );

  await withFetch(
    () => new Response('<html>', { status: 200 }),
    async () => {
      await assert.rejects(adapter.classify('Quiet room'), /not JSON/);
    },
  );

  await withFetch(
    () => new Response('{"error":"Model is loading"}', { status: 200 }),
    async () => {
      await assert.rejects(adapter.classify('Quiet room'), /no usable prediction/);
    },
  );
});
