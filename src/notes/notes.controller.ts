import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { API_PREFIX } from '../common/routes';
import { RateLimit } from '../rate-limit/rate-limit.decorator';
import { RateLimitGuard } from '../rate-limit/rate-limit.guard';
import { CreateNoteDto } from './notes.dto';
import { NotesService } from './notes.service';
import { toNoteResponse, type NoteResponse } from './notes.types';

@Controller(`${API_PREFIX}/destinations/:id/notes`)
@UseGuards(RateLimitGuard)
@RateLimit('crud')
export class NotesController {
  constructor(private readonly notes: NotesService) {}

  @Get()
  async list(@Param('id', ParseIntPipe) id: number): Promise<NoteResponse[]> {
    const notes = await this.notes.list(id);
    return notes.map(toNoteResponse);
  }

  @Post()
  async create(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: CreateNoteDto,
  ): Promise<NoteResponse> {
    return toNoteResponse(await this.notes.create(id, dto.content));
  }
}
