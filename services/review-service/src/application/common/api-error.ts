import { BadRequestException } from '@nestjs/common';
import { isRecord } from '@hotel-reviews/shared';

export type ReviewApiErrorCode = 'VALIDATION_FAILED' | 'HOTEL_NOT_FOUND' | 'DATABASE_UNAVAILABLE';

/** Response body of the exceptions this API raises itself. The HTTP filter forwards it unchanged. */
export interface ReviewApiError {
  code: ReviewApiErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

const API_ERROR_CODES: ReadonlySet<string> = new Set<ReviewApiErrorCode>([
  'VALIDATION_FAILED',
  'HOTEL_NOT_FOUND',
  'DATABASE_UNAVAILABLE',
]);

function isReviewApiErrorCode(value: unknown): value is ReviewApiErrorCode {
  return typeof value === 'string' && API_ERROR_CODES.has(value);
}

export function isReviewApiError(value: unknown): value is ReviewApiError {
  return (
    isRecord(value) &&
    isReviewApiErrorCode(value.code) &&
    typeof value.message === 'string' &&
    (value.details === undefined || isRecord(value.details))
  );
}

/** `field` names the body, query or path parameter that was rejected. */
export function validationFailed(message: string, field?: string): BadRequestException {
  const body: ReviewApiError = {
    code: 'VALIDATION_FAILED',
    message,
    ...(field === undefined ? {} : { details: { field } }),
  };
  return new BadRequestException(body);
}
