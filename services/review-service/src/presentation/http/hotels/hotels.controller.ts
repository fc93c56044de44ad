import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { HotelsApplicationService } from '../../../application/hotels/hotels.application.service';
import type { HotelRequestBody, ListHotelsRequestQuery } from './hotels.http-types';

@Controller('hotels')
export class HotelsController {
  constructor(private readonly hotelsService: HotelsApplicationService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async createHotel(@Body() body: HotelRequestBody) {
    return this.hotelsService.createHotel(body ?? {});
  }

  @Get()
  async listHotels(@Query() query: ListHotelsRequestQuery) {
    return this.hotelsService.listHotels(query);
  }

  @Get(':hotelId')
  async getHotel(@Param('hotelId') hotelId: string) {
    return this.hotelsService.getHotel(hotelId);
  }

  @Put(':hotelId')
  async updateHotel(@Param('hotelId') hotelId: string, @Body() body: HotelRequestBody) {
    return this.hotelsService.updateHotel(hotelId, body ?? {});
  }

  @Delete(':hotelId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteHotel(@Param('hotelId') hotelId: string): Promise<void> {
    await this.hotelsService.deleteHotel(hotelId);
  }
}
