import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import {
  isReviewAspect,
  isSentimentLabel,
  isString,
  jsonLogLine,
  readNullableList,
} from '@hotel-reviews/shared';
import { Pool } from 'pg';
import type {
  HotelsRepositoryPort,
  ListHotelsInput,
} from '../../application/hotels/ports/hotels-repository.port';
import type {
  ListReviewsByHotelInput,
  ReviewsRepositoryPort,
} from '../../application/reviews/ports/reviews-repository.port';
import type { DatabaseHealthPort } from '../../application/system/ports/database-health.port';
import type { Hotel, HotelChanges, NewHotel } from '../../domain/hotels/hotel';
import type { NewReview, Review, ReviewAnalysisFields } from '../../domain/reviews/review';
import { isReviewStatus, statusesAllowingTransitionTo } from '../../domain/reviews/review-status';
import { ReviewServiceConfigService } from '../config/review-service-config.service';

interface ReviewRow {
  id: number;
  hotel_id: number;
  user_name: string;
  user_email: string | null;
  rating: number;
  title: string | null;
  content: string;
  status: string;
  sentiment_score: number | null;
  sentiment_label: string | null;
  aspects: unknown;
  topics: unknown;
  key_phrases: unknown;
  created_at: Date;
  updated_at: Date;
}

interface HotelRow {
  id: number;
  name: string;
  city: string;
  country: string;
  address: string | null;
  description: string | null;
  star_rating: number | null;
  review_count: number;
  created_at: Date;
  updated_at: Date;
}

const REVIEW_COLUMNS = `
  id,
  hotel_id,
  user_name,
  user_email,
  rating,
  title,
  content,
  status,
  sentiment_score,
  sentiment_label,
  aspects,
  topics,
  key_phrases,
  created_at,
  updated_at
`;

const HOTEL_COLUMNS = `
  h.id,
  h.name,
  h.city,
  h.country,
  h.address,
  h.description,
  h.star_rating,
  (
    select count(*)::int
    from review_service.reviews r
    where r.hotel_id = h.id
  ) as review_count,
  h.created_at,
  h.updated_at
`;

const HOTEL_CHANGE_COLUMNS: Record<keyof HotelChanges, string> = {
  name: 'name',
  city: 'city',
  country: 'country',
  address: 'address',
  description: 'description',
  starRating: 'star_rating',
};

@Injectable()
export class PostgresReviewStoreRepository
  implements ReviewsRepositoryPort, HotelsRepositoryPort, DatabaseHealthPort, OnApplicationShutdown
{
  private readonly logger = new Logger(PostgresReviewStoreRepository.name);
  private readonly pool: Pool;

  constructor(config: ReviewServiceConfigService) {
    this.pool = new Pool({
      connectionString: config.databaseUrl,
      max: 10,
      idleTimeoutMillis: 10_000,
    });

    this.pool.on('error', (error: unknown) => {
      this.logger.error(jsonLogLine({
        level: 'error',
        service: 'review-service',
        message: 'Postgres pool error in review store.',
        correlationId: 'system',
        error,
      }));
    });
  }

  async onApplicationShutdown(): Promise<void> {
    await this.pool.end();
  }

  async ping(): Promise<void> {
    await this.pool.query('select 1');
  }

  async createReview(input: NewReview): Promise<Review> {
    const result = await this.pool.query<ReviewRow>(
      `
        insert into review_service.reviews (
          hotel_id,
          user_name,
          user_email,
          rating,
          title,
          content,
          status
        )
        values ($1, $2, $3, $4, $5, $6, 'PENDING')
        returning ${REVIEW_COLUMNS}
      `,
      [input.hotelId, input.userName, input.userEmail, input.rating, input.title, input.content],
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('Failed to create review.');
    }

    return mapReviewRow(row);
  }

  async findReviewById(reviewId: number): Promise<Review | undefined> {
    const result = await this.pool.query<ReviewRow>(
      `
        select ${REVIEW_COLUMNS}
        from review_service.reviews
        where id = $1
      `,
      [reviewId],
    );

    const row = result.rows[0];
    return row ? mapReviewRow(row) : undefined;
  }

  async listReviewsByHotel(input: ListReviewsByHotelInput): Promise<{ items: Review[]; total: number }> {
    const status = input.status ?? null;

    const countResult = await this.pool.query<{ total: number }>(
      `
        select count(*)::int as total
        from review_service.reviews
        where hotel_id = $1
          and ($2::text is null or status = $2)
      `,
      [input.hotelId, status],
    );

    const result = await this.pool.query<ReviewRow>(
      `
        select ${REVIEW_COLUMNS}
        from review_service.reviews
        where hotel_id = $1
          and ($2::text is null or status = $2)
        order by created_at desc, id desc
        limit $3
        offset $4
      `,
      [input.hotelId, status, input.limit, input.offset],
    );

    return {
      items: result.rows.map(mapReviewRow),
      total: countResult.rows[0]?.total ?? 0,
    };
  }

  async completeAnalysis(reviewId: number, fields: ReviewAnalysisFields): Promise<boolean> {
    const result = await this.pool.query(
      `
        update review_service.reviews
        set
          status = 'COMPLETED',
          sentiment_score = $2,
          sentiment_label = $3,
          aspects = $4::jsonb,
          topics = $5::jsonb,
          key_phrases = $6::jsonb,
          updated_at = now()
        where id = $1
      `,
      [
        reviewId,
        fields.sentimentScore,
        fields.sentimentLabel,
        toJsonParam(fields.aspects),
        toJsonParam(fields.topics),
        toJsonParam(fields.keyPhrases),
      ],
    );

    return (result.rowCount ?? 0) > 0;
  }

  async markProcessing(reviewId: number): Promise<boolean> {
    const result = await this.pool.query(
      `
        update review_service.reviews
        set status = 'PROCESSING', updated_at = now()
        where id = $1
          and status = any($2::text[])
      `,
      [reviewId, statusesAllowingTransitionTo('PROCESSING')],
    );

    return (result.rowCount ?? 0) > 0;
  }

  async markFailed(reviewId: number): Promise<boolean> {
    const result = await this.pool.query(
      `
        update review_service.reviews
        set status = 'FAILED', updated_at = now()
        where id = $1
          and status <> 'COMPLETED'
      `,
      [reviewId],
    );

    return (result.rowCount ?? 0) > 0;
  }

  async hotelExists(hotelId: number): Promise<boolean> {
    const result = await this.pool.query<{ exists: boolean }>(
      `
        select exists(
          select 1
          from review_service.hotels
          where id = $1
        ) as exists
      `,
      [hotelId],
    );

    return Boolean(result.rows[0]?.exists);
  }

  async createHotel(input: NewHotel): Promise<Hotel> {
    const result = await this.pool.query<HotelRow>(
      `
        with inserted as (
          insert into review_service.hotels (name, city, country, address, description, star_rating)
          values ($1, $2, $3, $4, $5, $6)
          returning *
        )
        select ${HOTEL_COLUMNS}
        from inserted h
      `,
      [input.name, input.city, input.country, input.address, input.description, input.starRating],
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('Failed to create hotel.');
    }

    return mapHotelRow(row);
  }

  async findHotelById(hotelId: number): Promise<Hotel | undefined> {
    const result = await this.pool.query<HotelRow>(
      `
        select ${HOTEL_COLUMNS}
        from review_service.hotels h
        where h.id = $1
      `,
      [hotelId],
    );

    const row = result.rows[0];
    return row ? mapHotelRow(row) : undefined;
  }

  async listHotels(input: ListHotelsInput): Promise<{ items: Hotel[]; total: number }> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (input.city) {
      params.push(input.city);
      conditions.push(`lower(h.city) = lower($${params.length})`);
    }
    if (input.country) {
      params.push(input.country);
      conditions.push(`lower(h.country) = lower($${params.length})`);
    }
    if (input.minStarRating !== undefined) {
      params.push(input.minStarRating);
      conditions.push(`h.star_rating >= $${params.length}`);
    }

    const where = conditions.length > 0 ? `where ${conditions.join(' and ')}` : '';

    const countResult = await this.pool.query<{ total: number }>(
      `
        select count(*)::int as total
        from review_service.hotels h
        ${where}
      `,
      params,
    );

    const result = await this.pool.query<HotelRow>(
      `
        select ${HOTEL_COLUMNS}
        from review_service.hotels h
        ${where}
        order by h.name asc, h.id asc
        limit $${params.length + 1}
        offset $${params.length + 2}
      `,
      [...params, input.limit, input.offset],
    );

    return {
      items: result.rows.map(mapHotelRow),
      total: countResult.rows[0]?.total ?? 0,
    };
  }

  async updateHotel(hotelId: number, changes: HotelChanges): Promise<Hotel | undefined> {
    const assignments: string[] = [];
    const params: unknown[] = [hotelId];

    for (const key of Object.keys(HOTEL_CHANGE_COLUMNS)) {
      if (!isHotelChangeKey(key) || changes[key] === undefined) {
        continue;
      }
      params.push(changes[key]);
      assignments.push(`${HOTEL_CHANGE_COLUMNS[key]} = $${params.length}`);
    }

    if (assignments.length === 0) {
      return this.findHotelById(hotelId);
    }

    const result = await this.pool.query<HotelRow>(
      `
        with updated as (
          update review_service.hotels
          set ${assignments.join(', ')}, updated_at = now()
          where id = $1
          returning *
        )
        select ${HOTEL_COLUMNS}
        from updated h
      `,
      params,
    );

    const row = result.rows[0];
    return row ? mapHotelRow(row) : undefined;
  }

  async deleteHotel(hotelId: number): Promise<boolean> {
    const result = await this.pool.query(
      `
        delete from review_service.hotels
        where id = $1
      `,
      [hotelId],
    );

    return (result.rowCount ?? 0) > 0;
  }
}

function mapReviewRow(row: ReviewRow): Review {
  if (!isReviewStatus(row.status)) {
    throw new Error(`Review ${row.id} has an unknown status "${row.status}".`);
  }

  return {
    id: row.id,
    hotelId: row.hotel_id,
    userName: row.user_name,
    userEmail: row.user_email,
    rating: row.rating,
    title: row.title,
    content: row.content,
    status: row.status,
    sentimentScore: row.sentiment_score,
    sentimentLabel: isSentimentLabel(row.sentiment_label) ? row.sentiment_label : null,
    aspects: readNullableList(row.aspects, isReviewAspect),
    topics: readNullableList(row.topics, isString),
    keyPhrases: readNullableList(row.key_phrases, isString),
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

function mapHotelRow(row: HotelRow): Hotel {
  return {
    id: row.id,
    name: row.name,
    city: row.city,
    country: row.country,
    address: row.address,
    description: row.description,
    starRating: row.star_rating,
    reviewCount: row.review_count,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

// node-postgres would encode a JS array as a Postgres array, not as jsonb.
function toJsonParam(value: unknown[] | null): string | null {
  return value === null ? null : JSON.stringify(value);
}

function isHotelChangeKey(key: string): key is keyof HotelChanges {
  return Object.prototype.hasOwnProperty.call(HOTEL_CHANGE_COLUMNS, key);
}
