import {
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { ReviewsApplicationService } from '../../../application/reviews/reviews.application.service';
import type { CreateReviewRequestBody, ListReviewsQuery } from './reviews.http-types';

@Controller()
export class ReviewsController {
  constructor(private readonly reviewsService: ReviewsApplicationService) {}

  @Post('reviews')
  @HttpCode(HttpStatus.CREATED)
  async createReview(
    @Body() body: CreateReviewRequestBody,
    @Headers('x-correlation-id') correlationId?: string,
  ) {
    return this.reviewsService.createReview({
      hotelId: body?.hotelId,
      userName: body?.userName,
      userEmail: body?.userEmail,
      rating: body?.rating,
      title: body?.title,
      content: body?.content,
      correlationId,
    });
  }

  @Get('reviews/:reviewId')
  async getReview(@Param('reviewId') reviewId: string) {
    return this.reviewsService.getReview(reviewId);
  }

  @Get('hotels/:hotelId/reviews')
  async listHotelReviews(
    @Param('hotelId') hotelId: string,
    @Query() query: ListReviewsQuery,
  ) {
    return this.reviewsService.listHotelReviews({
      hotelId,
      page: query.page,
      pageSize: query.pageSize,
      status: query.status,
    });
  }
}
