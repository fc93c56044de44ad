import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import {
  createReviewCreatedMessage,
  ensureCorrelationId,
  jsonLogLine,
} from '@hotel-reviews/shared';
import { REVIEW_LIMITS, type NewReview, type Review } from '../../domain/reviews/review';
import { isReviewStatus, type ReviewStatus } from '../../domain/reviews/review-status';
import { ReviewServiceConfigService } from '../../infrastructure/config/review-service-config.service';
import { validationFailed, type ReviewApiError } from '../common/api-error';
import { resolvePageRequest, toPage, type Page } from '../common/pagination';
import {
  normalizeIntegerInRange,
  normalizeOptionalString,
  normalizePositiveInteger,
  normalizeRequiredString,
  parseIdParam,
} from '../common/input-validation';
import { HOTELS_REPOSITORY_PORT, type HotelsRepositoryPort } from '../hotels/ports/hotels-repository.port';
import {
  REVIEW_EVENTS_PUBLISHER_PORT,
  type ReviewEventsPublisherPort,
} from './ports/review-events-publisher.port';
import { REVIEWS_REPOSITORY_PORT, type ReviewsRepositoryPort } from './ports/reviews-repository.port';

export interface CreateReviewInput {
  hotelId?: unknown;
  userName?: unknown;
  userEmail?: unknown;
  rating?: unknown;
  title?: unknown;
  content?: unknown;
  correlationId?: string;
}

export interface ListHotelReviewsInput {
  hotelId: string;
  page?: unknown;
  pageSize?: unknown;
  status?: unknown;
}

export interface CreatedReview extends Review {
  analysisQueued: boolean;
  correlationId: string;
}

@Injectable()
export class ReviewsApplicationService {
  private readonly logger = new Logger(ReviewsApplicationService.name);

  constructor(
    @Inject(REVIEWS_REPOSITORY_PORT)
    private readonly reviews: ReviewsRepositoryPort,
    @Inject(HOTELS_REPOSITORY_PORT)
    private readonly hotels: HotelsRepositoryPort,
    @Inject(REVIEW_EVENTS_PUBLISHER_PORT)
    private readonly publisher: ReviewEventsPublisherPort,
    private readonly config: ReviewServiceConfigService,
  ) {}

  /**
   * The review is committed as PENDING before publishing; a broker outage only shows up as
   * `analysisQueued: false`.
   */
  async createReview(input: CreateReviewInput): Promise<CreatedReview> {
    const parsed = parseCreateReviewInput(input);
    const correlationId = ensureCorrelationId(input.correlationId);

    if (!(await this.hotels.hotelExists(parsed.hotelId))) {
      const error: ReviewApiError = {
        code: 'HOTEL_NOT_FOUND',
        message: `Hotel ${parsed.hotelId} does not exist.`,
      };
      throw new BadRequestException(error);
    }

    const review = await this.reviews.createReview(parsed);
    const analysisQueued = await this.publisher.publishReviewCreated(
      createReviewCreatedMessage(review),
      { correlationId },
    );

    const logInput = {
      service: 'review-service',
      correlationId,
      messageType: 'ReviewCreated',
      reviewId: review.id,
      hotelId: review.hotelId,
    };
    if (analysisQueued) {
      this.logger.log(jsonLogLine({ ...logInput, level: 'info', message: 'Review created and queued for analysis.' }));
    } else {
      this.logger.warn(jsonLogLine({
        ...logInput,
        level: 'warn',
        message: 'Review created but could not be queued; it stays PENDING.',
      }));
    }

    return { ...review, analysisQueued, correlationId };
  }

  async getReview(reviewIdParam: string): Promise<Review> {
    const reviewId = parseIdParam(reviewIdParam, 'reviewId');
    const review = await this.reviews.findReviewById(reviewId);

    if (!review) {
      throw new NotFoundException(`Review ${reviewId} not found.`);
    }

    return review;
  }

  async listHotelReviews(input: ListHotelReviewsInput): Promise<Page<Review>> {
    const hotelId = parseIdParam(input.hotelId, 'hotelId');
    const status = parseStatusFilter(input.status);
    const pageRequest = resolvePageRequest(input, {
      defaultPageSize: this.config.defaultPageSize,
      maxPageSize: this.config.maxPageSize,
    });

    if (!(await this.hotels.hotelExists(hotelId))) {
      throw new NotFoundException(`Hotel ${hotelId} not found.`);
    }

    const { items, total } = await this.reviews.listReviewsByHotel({
      hotelId,
      limit: pageRequest.limit,
      offset: pageRequest.offset,
      status,
    });

    return toPage(items, total, pageRequest);
  }
}

function parseCreateReviewInput(input: CreateReviewInput): NewReview {
  const hotelId = normalizePositiveInteger(input.hotelId, 'hotelId');
  const userName = normalizeRequiredString(input.userName, 'userName', REVIEW_LIMITS.userNameMaxLength);
  const userEmail = normalizeOptionalString(input.userEmail, 'userEmail', REVIEW_LIMITS.userEmailMaxLength);
  const rating = normalizeIntegerInRange(input.rating, 'rating', REVIEW_LIMITS.minRating, REVIEW_LIMITS.maxRating);
  const title = normalizeOptionalString(input.title, 'title', REVIEW_LIMITS.titleMaxLength);

  if (typeof input.content !== 'string') {
    throw validationFailed('Field "content" must be a string.', 'content');
  }
  const content = input.content.trim();
  if (content.length < REVIEW_LIMITS.contentMinLength) {
    throw validationFailed(
      `Field "content" must be at least ${REVIEW_LIMITS.contentMinLength} characters.`,
      'content',
    );
  }

  return { hotelId, userName, userEmail, rating, title, content };
}

function parseStatusFilter(value: unknown): ReviewStatus | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }

  const normalized = typeof value === 'string' ? value.trim().toUpperCase() : value;
  if (!isReviewStatus(normalized)) {
    throw validationFailed(
      'Query parameter "status" must be one of PENDING, PROCESSING, COMPLETED, FAILED.',
      'status',
    );
  }

  return normalized;
}
