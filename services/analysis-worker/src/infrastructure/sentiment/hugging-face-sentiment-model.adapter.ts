import { Injectable } from '@nestjs/common';
import { isRecord } from '@hotel-reviews/shared';
import type {
  SentimentModelPort,
  StarRatingPrediction,
} from '../../application/analysis/ports/sentiment-model.port';
import { AnalysisWorkerConfigService } from '../config/analysis-worker-config.service';

export class SentimentModelError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SentimentModelError';
  }
}

/** Text classification over the Hugging Face Inference API. */
@Injectable()
export class HuggingFaceSentimentModelAdapter implements SentimentModelPort {
  constructor(private readonly config: AnalysisWorkerConfigService) {}

  async classify(text: string): Promise<StarRatingPrediction> {
    const headers: Record<string, string> = {
      'content-type': 'application/json',
      accept: 'application/json',
    };
    const token = this.config.sentimentModelApiToken;
    if (token) {
      headers.authorization = `Bearer ${token}`;
    }

    const timeoutMs = this.config.sentimentModelTimeoutMs;
    const response = await fetch(this.config.sentimentModelUrl, {
      method: 'POST',
      headers,
      body: JSON.stringify({ inputs: text }),
      signal: timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined,
    });

    if (!response.ok) {
      throw new SentimentModelError(`Sentiment model responded with HTTP ${response.status}.`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new SentimentModelError('Sentiment model returned a body that is not JSON.', { cause: error });
    }

    const prediction = parseStarRatingPrediction(body);
    if (!prediction) {
      throw new SentimentModelError('Sentiment model returned no usable prediction.');
    }

    return prediction;
  }
}

/**
 * Picks the highest-scoring label from `[{label, score}, ...]` or the batched
 * `[[{label, score}, ...]]` form.
 */
export function parseStarRatingPrediction(body: unknown): StarRatingPrediction | undefined {
  if (!Array.isArray(body)) {
    return undefined;
  }

  const first: unknown = body[0];
  const candidates: unknown[] = Array.isArray(first) ? first : body;
  let best: StarRatingPrediction | undefined;

  for (const candidate of candidates) {
    if (!isRecord(candidate)) {
      continue;
    }

    const label = candidate.label;
    const score = candidate.score;
    if (typeof label !== 'string' || typeof score !== 'number' || !Number.isFinite(score)) {
      continue;
    }

    if (!best || score > best.score) {
      best = { label, score };
    }
  }

  return best;
}
