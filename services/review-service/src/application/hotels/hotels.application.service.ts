import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { HOTEL_LIMITS, type Hotel, type HotelChanges, type NewHotel } from '../../domain/hotels/hotel';
import { ReviewServiceConfigService } from '../../infrastructure/config/review-service-config.service';
import {
  normalizeOptionalNumberInRange,
  normalizeOptionalString,
  normalizeRequiredString,
  parseIdParam,
} from '../common/input-validation';
import { validationFailed } from '../common/api-error';
import { resolvePageRequest, toPage, type Page } from '../common/pagination';
import { HOTELS_REPOSITORY_PORT, type HotelsRepositoryPort } from './ports/hotels-repository.port';

export interface HotelInput {
  name?: unknown;
  city?: unknown;
  country?: unknown;
  address?: unknown;
  description?: unknown;
  starRating?: unknown;
}

export interface ListHotelsQuery {
  page?: unknown;
  pageSize?: unknown;
  city?: unknown;
  country?: unknown;
  minRating?: unknown;
}

@Injectable()
export class HotelsApplicationService {
  private readonly logger = new Logger(HotelsApplicationService.name);

  constructor(
    @Inject(HOTELS_REPOSITORY_PORT)
    private readonly hotels: HotelsRepositoryPort,
    private readonly config: ReviewServiceConfigService,
  ) {}

  async createHotel(input: HotelInput): Promise<Hotel> {
    const hotel = await this.hotels.createHotel(parseNewHotel(input));
    this.logger.log(`Hotel created id=${hotel.id}`);
    return hotel;
  }

  async getHotel(hotelIdParam: string): Promise<Hotel> {
    const hotelId = parseIdParam(hotelIdParam, 'hotelId');
    const hotel = await this.hotels.findHotelById(hotelId);

    if (!hotel) {
      throw new NotFoundException(`Hotel ${hotelId} not found.`);
    }

    return hotel;
  }

  async listHotels(query: ListHotelsQuery): Promise<Page<Hotel>> {
    const pageRequest = resolvePageRequest(query, {
      defaultPageSize: this.config.defaultPageSize,
      maxPageSize: this.config.maxPageSize,
    });

    const { items, total } = await this.hotels.listHotels({
      limit: pageRequest.limit,
      offset: pageRequest.offset,
      city: optionalQueryString(query.city),
      country: optionalQueryString(query.country),
      minStarRating: parseMinRating(query.minRating),
    });

    return toPage(items, total, pageRequest);
  }

  async updateHotel(hotelIdParam: string, input: HotelInput): Promise<Hotel> {
    const hotelId = parseIdParam(hotelIdParam, 'hotelId');
    const changes = parseHotelChanges(input);

    if (Object.keys(changes).length === 0) {
      throw validationFailed('At least one hotel field must be provided.');
    }

    const hotel = await this.hotels.updateHotel(hotelId, changes);
    if (!hotel) {
      throw new NotFoundException(`Hotel ${hotelId} not found.`);
    }

    this.logger.log(`Hotel updated id=${hotelId}`);
    return hotel;
  }

  /** Reviews of the hotel are removed with it. */
  async deleteHotel(hotelIdParam: string): Promise<void> {
    const hotelId = parseIdParam(hotelIdParam, 'hotelId');

    if (!(await this.hotels.deleteHotel(hotelId))) {
      throw new NotFoundException(`Hotel ${hotelId} not found.`);
    }

    this.logger.log(`Hotel deleted id=${hotelId}`);
  }
}

function parseNewHotel(input: HotelInput): NewHotel {
  return {
    name: normalizeRequiredString(input.name, 'name', HOTEL_LIMITS.nameMaxLength),
    city: normalizeRequiredString(input.city, 'city', HOTEL_LIMITS.cityMaxLength),
    country: normalizeRequiredString(input.country, 'country', HOTEL_LIMITS.countryMaxLength),
    address: normalizeOptionalString(input.address, 'address', HOTEL_LIMITS.addressMaxLength),
    description: normalizeOptionalString(input.description, 'description'),
    starRating: normalizeOptionalNumberInRange(
      input.starRating,
      'starRating',
      HOTEL_LIMITS.minStarRating,
      HOTEL_LIMITS.maxStarRating,
    ),
  };
}

// Only fields present in the body change; null clears an optional field.
function parseHotelChanges(input: HotelInput): HotelChanges {
  const changes: HotelChanges = {};

  if (input.name !== undefined) {
    changes.name = normalizeRequiredString(input.name, 'name', HOTEL_LIMITS.nameMaxLength);
  }
  if (input.city !== undefined) {
    changes.city = normalizeRequiredString(input.city, 'city', HOTEL_LIMITS.cityMaxLength);
  }
  if (input.country !== undefined) {
    changes.country = normalizeRequiredString(input.country, 'country', HOTEL_LIMITS.countryMaxLength);
  }
  if (input.address !== undefined) {
    changes.address = normalizeOptionalString(input.address, 'address', HOTEL_LIMITS.addressMaxLength);
  }
  if (input.description !== undefined) {
    changes.description = normalizeOptionalString(input.description, 'description');
  }
  if (input.starRating !== undefined) {
    changes.starRating = normalizeOptionalNumberInRange(
      input.starRating,
      'starRating',
      HOTEL_LIMITS.minStarRating,
      HOTEL_LIMITS.maxStarRating,
    );
  }

  return changes;
}

function optionalQueryString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }

  const normalized = value.trim();
  return normalized.length > 0 ? normalized : undefined;
}

function parseMinRating(value: unknown): number | undefined {
  const raw = optionalQueryString(value);
  if (raw === undefined) {
    return undefined;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < HOTEL_LIMITS.minStarRating || parsed > HOTEL_LIMITS.maxStarRating) {
    throw validationFailed(
      `Query parameter "minRating" must be a number between ${HOTEL_LIMITS.minStarRating} and ${HOTEL_LIMITS.maxStarRating}.`,
      'minRating',
    );
  }

  return parsed;
}
