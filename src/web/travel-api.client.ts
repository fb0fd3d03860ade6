import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  ApiResult,
  AskResult,
  DestinationDeletion,
  DestinationResponse,
  NoteResponse,
} from './web.models';

const CRUD_TIMEOUT_MS = 15_000;
const ASK_TIMEOUT_MS = 120_000;

/**
 * REST client used by the server-rendered pages. Every call resolves to an
 * {@link ApiResult}; transport failures never reject.
 */
@Injectable()
export class TravelApiClient {
  private readonly logger = new Logger(TravelApiClient.name);
  private readonly baseUrl: string;

  constructor(private readonly config: ConfigService) {
    const port = this.config.get<number>('PORT') ?? 8000;
    this.baseUrl = (
      this.config.get<string>('API_BASE_URL') ?? `http://localhost:${port}/api/v1`
    ).replace(/\/+$/, '');
  }

  listDestinations(): Promise<ApiResult<DestinationResponse[]>> {
    return this.request('GET', '/destinations');
  }

  createDestination(name: string): Promise<ApiResult<DestinationResponse>> {
    return this.request('POST', '/destinations', { name });
  }

  deleteDestination(id: number): Promise<ApiResult<DestinationDeletion>> {
    return this.request('DELETE', `/destinations/${id}`);
  }

  listNotes(destinationId: number): Promise<ApiResult<NoteResponse[]>> {
    return this.request('GET', `/destinations/${destinationId}/notes`);
  }

  createNote(destinationId: number, content: string): Promise<ApiResult<NoteResponse>> {
    return this.request('POST', `/destinations/${destinationId}/notes`, { content });
  }

  ask(destinationId: number, question: string): Promise<ApiResult<AskResult>> {
    return this.request(
      'POST',
      '/ask',
      { destination_id: destinationId, question },
      ASK_TIMEOUT_MS,
    );
  }

  private async request<T>(
    method: 'GET' | 'POST' | 'DELETE',
    path: string,
    body?: unknown,
    timeoutMs = CRUD_TIMEOUT_MS,
  ): Promise<ApiResult<T>> {
    const url = `${this.baseUrl}${path}`;
    try {
      const res = await fetch(url, {
        method,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (!res.ok) {
        const error = await this.errorMessage(res);
        this.logger.warn(`${method} ${url} failed: ${res.status} ${error}`);
        return { ok: false, status: res.status, error };
      }
      return { ok: true, data: (await res.json()) as T };
    } catch (error) {
      const message =
        error instanceof Error && error.name === 'TimeoutError'
          ? 'The request timed out'
          : `Could not reach the API: ${(error as Error).message}`;
      this.logger.error(`${method} ${url} failed: ${message}`);
      return { ok: false, status: null, error: message };
    }
  }

  private async errorMessage(res: Response): Promise<string> {
    const fallback = `HTTP ${res.status}`;
    try {
      const body: unknown = await res.json();
      if (typeof body !== 'object' || body === null) return fallback;
      const message: unknown = Reflect.get(body, 'message');
      if (typeof message === 'string') return message;
      if (Array.isArray(message)) return message.map(String).join(', ');
      return fallback;
    } catch {
      return fallback;
    }
  }
}
