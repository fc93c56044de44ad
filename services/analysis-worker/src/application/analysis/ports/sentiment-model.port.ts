export const SENTIMENT_MODEL_PORT = Symbol('SENTIMENT_MODEL_PORT');

export interface StarRatingPrediction {
  label: string;
  score: number;
}

export interface SentimentModelPort {
  /** Rejects when the model cannot produce a prediction. */
  classify(text: string): Promise<StarRatingPrediction>;
}
