// Bodies are validated by the application services; fields stay `unknown` until then.
export interface CreateReviewRequestBody {
  hotelId?: unknown;
  userName?: unknown;
  userEmail?: unknown;
  rating?: unknown;
  title?: unknown;
  content?: unknown;
}

export interface ListReviewsQuery {
  page?: string;
  pageSize?: string;
  status?: string;
}
