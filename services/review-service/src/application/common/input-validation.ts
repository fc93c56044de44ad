import { validationFailed } from './api-error';

export function normalizeRequiredString(value: unknown, fieldName: string, maxLength?: number): string {
  if (typeof value !== 'string') {
    throw validationFailed(`Field "${fieldName}" must be a string.`, fieldName);
  }

  const normalized = value.trim();
  if (!normalized) {
    throw validationFailed(`Field "${fieldName}" is required.`, fieldName);
  }

  assertMaxLength(normalized, fieldName, maxLength);
  return normalized;
}

/** Absent, null and blank strings all normalize to null. */
export function normalizeOptionalString(value: unknown, fieldName: string, maxLength?: number): string | null {
  if (value === undefined || value === null) {
    return null;
  }

  if (typeof value !== 'string') {
    throw validationFailed(`Field "${fieldName}" must be a string.`, fieldName);
  }

  const normalized = value.trim();
  if (!normalized) {
    return null;
  }

  assertMaxLength(normalized, fieldName, maxLength);
  return normalized;
}

export function normalizeIntegerInRange(value: unknown, fieldName: string, min: number, max: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw validationFailed(`Field "${fieldName}" must be a number.`, fieldName);
  }

  if (!Number.isInteger(value) || value < min || value > max) {
    throw validationFailed(`Field "${fieldName}" must be an integer between ${min} and ${max}.`, fieldName);
  }

  return value;
}

export function normalizeOptionalNumberInRange(
  value: unknown,
  fieldName: string,
  min: number,
  max: number,
): number | null {
  if (value === undefined || value === null) {
    return null;
  }

  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw validationFailed(`Field "${fieldName}" must be a number.`, fieldName);
  }

  if (value < min || value > max) {
    throw validationFailed(`Field "${fieldName}" must be between ${min} and ${max}.`, fieldName);
  }

  return value;
}

export function normalizePositiveInteger(value: unknown, fieldName: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw validationFailed(`Field "${fieldName}" must be a positive integer.`, fieldName);
  }

  return value;
}

export function parseIdParam(value: string, paramName: string): number {
  const parsed = /^\d+$/.test(value.trim()) ? Number(value.trim()) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw validationFailed(`Path parameter "${paramName}" must be a positive integer.`, paramName);
  }

  return parsed;
}

function assertMaxLength(value: string, fieldName: string, maxLength?: number): void {
  if (maxLength !== undefined && value.length > maxLength) {
    throw validationFailed(`Field "${fieldName}" must be at most ${maxLength} characters.`, fieldName);
  }
}
