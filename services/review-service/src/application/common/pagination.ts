import { validationFailed } from './api-error';

export interface PageRequest {
  page: number;
  pageSize: number;
  limit: number;
  offset: number;
}

export interface Page<TItem> {
  items: TItem[];
  page: number;
  pageSize: number;
  total: number;
  totalPages: number;
}

/** `pageSize` above the maximum is clamped rather than rejected. */
export function resolvePageRequest(
  raw: { page?: unknown; pageSize?: unknown },
  limits: { defaultPageSize: number; maxPageSize: number },
): PageRequest {
  const page = parseOptionalPositiveInteger(raw.page, 'page') ?? 1;
  const requestedPageSize = parseOptionalPositiveInteger(raw.pageSize, 'pageSize') ?? limits.defaultPageSize;
  const pageSize = Math.min(requestedPageSize, limits.maxPageSize);

  return {
    page,
    pageSize,
    limit: pageSize,
    offset: (page - 1) * pageSize,
  };
}

export function toPage<TItem>(items: TItem[], total: number, request: PageRequest): Page<TItem> {
  return {
    items,
    page: request.page,
    pageSize: request.pageSize,
    total,
    totalPages: total === 0 ? 0 : Math.ceil(total / request.pageSize),
  };
}

function parseOptionalPositiveInteger(value: unknown, fieldName: string): number | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }

  const parsed = typeof value === 'number' ? value : Number(String(value).trim());
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw validationFailed(`Query parameter "${fieldName}" must be an integer >= 1.`, fieldName);
  }

  return parsed;
}
