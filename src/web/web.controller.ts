import {
  Body,
  Controller,
  Get,
  Header,
  Param,
  ParseIntPipe,
  Post,
  Query,
  Req,
  Res,
} from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import type { Request, Response } from 'express';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { TravelApiClient } from './travel-api.client';
import {
  ClearChatFormDto,
  DestinationFormDto,
  NoteFormDto,
  QuestionFormDto,
} from './web.dto';
import type { ApiResult, DestinationResponse, Flash, NoteResponse } from './web.models';
import { clockTime, SESSION_TTL_MS, WebSessionStore } from './web-session.store';
import { askPage, destinationsPage, notesPage } from './web.views';

export const SESSION_COOKIE = 'sid';
const HTML = 'text/html; charset=utf-8';

export function parseDestinationId(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value.trim())) return null;
  const id = Number(value.trim());
  return id > 0 ? id : null;
}

function pick(
  destinations: DestinationResponse[],
  id: number | null,
): DestinationResponse | null {
  return destinations.find((d) => d.id === id) ?? destinations[0] ?? null;
}

/** Server-rendered pages; all data goes through the REST API. */
@ApiExcludeController()
@Controller('app')
export class WebController {
  constructor(
    private readonly api: TravelApiClient,
    private readonly sessions: WebSessionStore,
  ) {}

  @Get()
  root(@Res() res: Response): void {
    res.redirect('/app/destinations');
  }

  @Get('destinations')
  @Header('Content-Type', HTML)
  async destinations(
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response,
  ): Promise<string> {
    const sid = this.session(req, res);
    const result = await this.api.listDestinations();
    const notices = this.sessions.takeFlashes(sid);
    if (!result.ok) {
      notices.push({ kind: 'error', text: `Error fetching destinations: ${result.error}` });
    }
    return destinationsPage(notices, result.ok ? result.data : []);
  }

  @Post('destinations')
  async addDestination(
    @Req() req: Request,
    @Res() res: Response,
    @Body() form: DestinationFormDto,
  ): Promise<void> {
    const sid = this.session(req, res);
    const name = form.name.trim();
    if (!name) {
      this.notify(sid, 'error', 'Destination name cannot be empty');
    } else {
      const result = await this.api.createDestination(name);
      if (result.ok) {
        this.notify(sid, 'success', `✅ Added destination: ${result.data.name}`);
      } else {
        this.notify(sid, 'error', `Error creating destination: ${result.error}`);
      }
    }
    res.redirect(303, '/app/destinations');
  }

  @Post('destinations/:id/delete')
  async deleteDestination(
    @Req() req: Request,
    @Res() res: Response,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<void> {
    const sid = this.session(req, res);
    const result = await this.api.deleteDestination(id);
    if (result.ok) {
      this.sessions.clear(sid, id);
      this.notify(sid, 'success', result.data.message);
    } else {
      this.notify(sid, 'error', `Error deleting destination: ${result.error}`);
    }
    res.redirect(303, '/app/destinations');
  }

  @Get('notes')
  @Header('Content-Type', HTML)
  async notes(
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response,
    @Query('destination') destination?: string,
  ): Promise<string> {
    const sid = this.session(req, res);
    const notices: Flash[] = [];
    const listed = await this.api.listDestinations();
    if (!listed.ok) {
      notices.push({ kind: 'error', text: `Error fetching destinations: ${listed.error}` });
    }
    const destinations = listed.ok ? listed.data : [];
    const selected = pick(destinations, parseDestinationId(destination));

    let notes: ApiResult<NoteResponse[]> = { ok: true, data: [] };
    if (selected) {
      notes = await this.api.listNotes(selected.id);
      if (!notes.ok) {
        notices.push({ kind: 'error', text: `Error fetching notes: ${notes.error}` });
      }
    }
    return notesPage(
      [...this.sessions.takeFlashes(sid), ...notices],
      destinations,
      selected,
      notes.ok ? notes.data : [],
    );
  }

  @Post('notes')
  async addNote(
    @Req() req: Request,
    @Res() res: Response,
    @Body() form: NoteFormDto,
  ): Promise<void> {
    const sid = this.session(req, res);
    const id = parseDestinationId(form.destination);
    const content = form.content.trim();

    if (id === null) {
      this.notify(sid, 'error', 'Invalid destination ID');
    } else if (!content) {
      this.notify(sid, 'error', 'Note content cannot be empty');
    } else {
      const result = await this.api.createNote(id, content);
      if (result.ok) {
        this.notify(sid, 'success', '✅ Note added!');
      } else {
        this.notify(sid, 'error', `Error creating note: ${result.error}`);
      }
    }
    res.redirect(303, id === null ? '/app/notes' : `/app/notes?destination=${id}`);
  }

  @Get('ask')
  @Header('Content-Type', HTML)
  async ask(
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response,
    @Query('destination') destination?: string,
  ): Promise<string> {
    const sid = this.session(req, res);
    const notices = this.sessions.takeFlashes(sid);
    const listed = await this.api.listDestinations();
    if (!listed.ok) {
      notices.push({ kind: 'error', text: `Error fetching destinations: ${listed.error}` });
    }
    const destinations = listed.ok ? listed.data : [];
    const selected = pick(destinations, parseDestinationId(destination));
    const transcript = selected ? this.sessions.transcript(sid, selected.id) : [];
    return askPage(notices, destinations, selected, transcript);
  }

  @Post('ask')
  async askQuestion(
    @Req() req: Request,
    @Res() res: Response,
    @Body() form: QuestionFormDto,
  ): Promise<void> {
    const sid = this.session(req, res);
    const id = parseDestinationId(form.destination);
    const question = form.question.trim();

    if (id === null) {
      this.notify(sid, 'error', 'Invalid destination ID');
      res.redirect(303, '/app/ask');
      return;
    }

    if (question) {
      this.sessions.append(sid, id, {
        text: question,
        isUser: true,
        timestamp: clockTime(new Date()),
      });
      const result = await this.api.ask(id, question);
      if (result.ok) {
        this.sessions.append(sid, id, {
          text: result.data.answer,
          isUser: false,
          timestamp: clockTime(new Date()),
          ...(result.data.weather_info ? { weather: result.data.weather_info } : {}),
        });
      } else {
        this.notify(sid, 'error', `Error asking AI: ${result.error}`);
      }
    }
    res.redirect(303, `/app/ask?destination=${id}`);
  }

  @Post('ask/clear')
  clearChat(
    @Req() req: Request,
    @Res() res: Response,
    @Body() form: ClearChatFormDto,
  ): void {
    const sid = this.session(req, res);
    const id = parseDestinationId(form.destination);
    if (id !== null) this.sessions.clear(sid, id);
    res.redirect(303, id === null ? '/app/ask' : `/app/ask?destination=${id}`);
  }

  private session(req: Request, res: Response): string {
    const current: unknown = req.cookies?.[SESSION_COOKIE];
    const sid = typeof current === 'string' && isUuid(current) ? current : uuidv4();
    res.cookie(SESSION_COOKIE, sid, {
      httpOnly: true,
      sameSite: 'lax',
      maxAge: SESSION_TTL_MS,
    });
    return sid;
  }

  private notify(sid: string, kind: Flash['kind'], text: string): void {
    this.sessions.flash(sid, { kind, text });
  }
}
