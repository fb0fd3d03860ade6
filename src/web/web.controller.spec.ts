import type { INestApplication } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { configureApp } from '../app.setup';
import { TravelApiClient } from './travel-api.client';
import { parseDestinationId, WebController } from './web.controller';
import type {
  ApiResult,
  AskResult,
  DestinationDeletion,
  DestinationResponse,
  NoteResponse,
} from './web.models';
import { WebSessionStore } from './web-session.store';

const OFFLINE = { ok: false, status: null, error: 'Could not reach the API: fetch failed' } as const;

class FakeTravelApi implements Pick<TravelApiClient, keyof TravelApiClient> {
  destinations: DestinationResponse[] = [
    { id: 1, name: 'Paris', created_at: '2024-05-01T10:00:00.000Z' },
    { id: 2, name: 'Rome', created_at: '2024-05-02T10:00:00.000Z' },
  ];
  notes: NoteResponse[] = [
    { id: 1, destination_id: 2, content: 'Trastevere for dinner', created_at: '2024-05-02T11:00:00.000Z' },
  ];
  offline = false;
  askResult: ApiResult<AskResult> = {
    ok: true,
    data: { answer: 'Closed on Tuesdays.', weather_info: 'Sunny, 20°C' },
  };
  readonly created: string[] = [];
  readonly questions: string[] = [];
  readonly addedNotes: string[] = [];

  async listDestinations(): Promise<ApiResult<DestinationResponse[]>> {
    return this.offline ? OFFLINE : { ok: true, data: this.destinations };
  }

  async createDestination(name: string): Promise<ApiResult<DestinationResponse>> {
    if (this.destinations.some((d) => d.name === name)) {
      return { ok: false, status: 400, error: 'Destination already exists' };
    }
    this.created.push(name);
    return { ok: true, data: { id: 3, name, created_at: '2024-05-03T10:00:00.000Z' } };
  }

  async deleteDestination(id: number): Promise<ApiResult<DestinationDeletion>> {
    return {
      ok: true,
      data: {
        message: `Destination deleted successfully (removed ${id === 2 ? 1 : 0} associated notes)`,
        removedNotes: id === 2 ? 1 : 0,
      },
    };
  }

  async listNotes(destinationId: number): Promise<ApiResult<NoteResponse[]>> {
    return { ok: true, data: this.notes.filter((n) => n.destination_id === destinationId) };
  }

  async createNote(destinationId: number, content: string): Promise<ApiResult<NoteResponse>> {
    this.addedNotes.push(content);
    return {
      ok: true,
      data: { id: 9, destination_id: destinationId, content, created_at: '2024-05-03T10:00:00.000Z' },
    };
  }

  async ask(_destinationId: number, question: string): Promise<ApiResult<AskResult>> {
    this.questions.push(question);
    return this.askResult;
  }
}

describe('WebController', () => {
  let app: INestApplication;
  let api: FakeTravelApi;

  beforeEach(async () => {
    api = new FakeTravelApi();
    const moduleRef = await Test.createTestingModule({
      imports: [ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true })],
      controllers: [WebController],
      providers: [WebSessionStore, { provide: TravelApiClient, useValue: api }],
    }).compile();

    app = moduleRef.createNestApplication();
    configureApp(app);
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('redirects the root to the destinations page', async () => {
    await request(app.getHttpServer())
      .get('/app')
      .expect(302)
      .expect('Location', '/app/destinations');
  });

  it('renders destinations as escaped HTML and starts a session', async () => {
    api.destinations.push({ id: 4, name: '<b>Bold</b>', created_at: '2024-05-04T10:00:00.000Z' });

    const res = await request(app.getHttpServer()).get('/app/destinations').expect(200);

    expect(res.headers['content-type']).toMatch(/^text\/html/);
    expect(res.text).toContain('<strong>&lt;b&gt;Bold&lt;/b&gt;</strong>');
    expect(res.headers['set-cookie'][0]).toMatch(/^sid=[0-9a-f-]{36};/);
  });

  it('adds a destination and shows a confirmation on the next page', async () => {
    const agent = request.agent(app.getHttpServer());

    await agent
      .post('/app/destinations')
      .type('form')
      .send({ name: '  Lisbon ' })
      .expect(303)
      .expect('Location', '/app/destinations');
    const page = await agent.get('/app/destinations').expect(200);

    expect(api.created).toEqual(['Lisbon']);
    expect(page.text).toContain('<div class="flash success">✅ Added destination: Lisbon</div>');
  });

  it('shows the API error when a destination cannot be added', async () => {
    const agent = request.agent(app.getHttpServer());

    await agent.post('/app/destinations').type('form').send({ name: 'Paris' }).expect(303);
    const page = await agent.get('/app/destinations');

    expect(page.text).toContain(
      '<div class="flash error">Error creating destination: Destination already exists</div>',
    );
  });

  it('reports the deletion result', async () => {
    const agent = request.agent(app.getHttpServer());

    await agent.post('/app/destinations/2/delete').expect(303);
    const page = await agent.get('/app/destinations');

    expect(page.text).toContain(
      '<div class="flash success">Destination deleted successfully (removed 1 associated notes)</div>',
    );
  });

  it('renders a flash instead of failing when the API is down', async () => {
    api.offline = true;

    const res = await request(app.getHttpServer()).get('/app/destinations').expect(200);

    expect(res.text).toContain(
      '<div class="flash error">Error fetching destinations: Could not reach the API: fetch failed</div>',
    );
    expect(res.text).toContain('<p>No destinations yet. Add your first destination above!</p>');
  });

  it('shows the notes of the selected destination', async () => {
    const res = await request(app.getHttpServer()).get('/app/notes?destination=2').expect(200);

    expect(res.text).toContain('<h3>Notes for Rome</h3>');
    expect(res.text).toContain('<div class="card note">Trastevere for dinner<br>');
  });

  it('falls back to the first destination for an unknown selection', async () => {
    const res = await request(app.getHttpServer()).get('/app/notes?destination=abc').expect(200);

    expect(res.text).toContain('<h3>Notes for Paris</h3>');
  });

  it('refuses empty notes without calling the API', async () => {
    const agent = request.agent(app.getHttpServer());

    await agent
      .post('/app/notes')
      .type('form')
      .send({ destination: '1', content: '   ' })
      .expect(303)
      .expect('Location', '/app/notes?destination=1');
    const page = await agent.get('/app/notes?destination=1');

    expect(api.addedNotes).toEqual([]);
    expect(page.text).toContain('<div class="flash error">Note content cannot be empty</div>');
  });

  it('keeps the chat transcript per session and clears it on request', async () => {
    const agent = request.agent(app.getHttpServer());

    await agent
      .post('/app/ask')
      .type('form')
      .send({ destination: '1', question: 'When is the Louvre closed?' })
      .expect(303)
      .expect('Location', '/app/ask?destination=1');
    const chat = await agent.get('/app/ask?destination=1');

    expect(api.questions).toEqual(['When is the Louvre closed?']);
    expect(chat.text).toContain('<div class="msg user">When is the Louvre closed?<div class="time">');
    expect(chat.text).toContain(
      '<div class="msg ai">Closed on Tuesdays.<div class="weather">🌤️ Sunny, 20°C</div><div class="time">',
    );

    const stranger = await request(app.getHttpServer()).get('/app/ask?destination=1');
    expect(stranger.text).toContain(
      '<p>Ask anything about Paris: sights, opening hours, the weather...</p>',
    );

    await agent.post('/app/ask/clear').type('form').send({ destination: '1' }).expect(303);
    const cleared = await agent.get('/app/ask?destination=1');
    expect(cleared.text).toContain(
      '<p>Ask anything about Paris: sights, opening hours, the weather...</p>',
    );
  });

  it('keeps the question and flashes the error when the advisor fails', async () => {
    const agent = request.agent(app.getHttpServer());
    api.askResult = { ok: false, status: 429, error: 'Rate limit exceeded' };

    await agent
      .post('/app/ask')
      .type('form')
      .send({ destination: '1', question: 'Any tips?' })
      .expect(303);
    const chat = await agent.get('/app/ask?destination=1');

    expect(chat.text).toContain('<div class="flash error">Error asking AI: Rate limit exceeded</div>');
    expect(chat.text).toContain('<div class="msg user">Any tips?<div class="time">');
  });
});

describe('parseDestinationId', () => {
  it('accepts positive integers only', () => {
    expect(parseDestinationId(' 12 ')).toBe(12);
    expect(parseDestinationId('0')).toBeNull();
    expect(parseDestinationId('-1')).toBeNull();
    expect(parseDestinationId('1.5')).toBeNull();
    expect(parseDestinationId(undefined)).toBeNull();
  });
});
