export interface HotelRequestBody {
  name?: unknown;
  city?: unknown;
  country?: unknown;
  address?: unknown;
  description?: unknown;
  starRating?: unknown;
}

export interface ListHotelsRequestQuery {
  page?: string;
  pageSize?: string;
  city?: string;
  country?: string;
  minRating?: string;
}
