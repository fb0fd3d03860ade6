import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { API_PREFIX } from '../common/routes';
import { RateLimit } from '../rate-limit/rate-limit.decorator';
import { RateLimitGuard } from '../rate-limit/rate-limit.guard';
import { CreateDestinationDto } from './destinations.dto';
import { DestinationsService } from './destinations.service';
import {
  toDestinationResponse,
  type DestinationDeletion,
  type DestinationResponse,
} from './destinations.types';

@Controller(`${API_PREFIX}/destinations`)
@UseGuards(RateLimitGuard)
@RateLimit('crud')
export class DestinationsController {
  constructor(private readonly destinations: DestinationsService) {}

  @Get()
  async list(): Promise<DestinationResponse[]> {
    const all = await this.destinations.list();
    return all.map(toDestinationResponse);
  }

  @Post()
  async create(@Body() dto: CreateDestinationDto): Promise<DestinationResponse> {
    return toDestinationResponse(await this.destinations.create(dto.name));
  }

  @Delete(':id')
  async remove(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<DestinationDeletion> {
    return this.destinations.remove(id);
  }
}
