export const HOTEL_LIMITS = {
  nameMaxLength: 200,
  cityMaxLength: 100,
  countryMaxLength: 100,
  addressMaxLength: 500,
  minStarRating: 1,
  maxStarRating: 5,
} as const;

export interface Hotel {
  id: number;
  name: string;
  city: string;
  country: string;
  address: string | null;
  description: string | null;
  starRating: number | null;
  reviewCount: number;
  createdAt: string;
  updatedAt: string;
}

export interface NewHotel {
  name: string;
  city: string;
  country: string;
  address: string | null;
  description: string | null;
  starRating: number | null;
}

export type HotelChanges = Partial<NewHotel>;
