import type { Hotel, HotelChanges, NewHotel } from '../../../domain/hotels/hotel';

export const HOTELS_REPOSITORY_PORT = Symbol('HOTELS_REPOSITORY_PORT');

export interface ListHotelsInput {
  limit: number;
  offset: number;
  city?: string;
  country?: string;
  minStarRating?: number;
}

export interface HotelsRepositoryPort {
  hotelExists(hotelId: number): Promise<boolean>;
  createHotel(input: NewHotel): Promise<Hotel>;
  findHotelById(hotelId: number): Promise<Hotel | undefined>;
  listHotels(input: ListHotelsInput): Promise<{ items: Hotel[]; total: number }>;
  updateHotel(hotelId: number, changes: HotelChanges): Promise<Hotel | undefined>;
  deleteHotel(hotelId: number): Promise<boolean>;
}
