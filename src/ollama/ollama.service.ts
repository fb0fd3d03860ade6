import {
  Injectable,
  InternalServerErrorException,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  ChatMessage,
  OllamaChatResponse,
  OllamaEmbedResponse,
  OllamaGenerateResponse,
  ToolDefinition,
} from './ollama.types';

@Injectable()
export class OllamaService {
  private readonly logger = new Logger(OllamaService.name);
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly llmModel: string;
  private readonly embedModel: string;
  private readonly timeoutMs: number;
  private readonly temperature: number;

  constructor(private readonly config: ConfigService) {
    this.baseUrl =
      this.config.get<string>('OLLAMA_BASE_URL') ?? 'http://127.0.0.1:11434';
    this.apiKey = this.config.get<string>('LLM_API_KEY') || undefined;
    this.llmModel =
      this.config.get<string>('OLLAMA_LLM_MODEL') ?? 'mistral:latest';
    this.embedModel =
      this.config.get<string>('OLLAMA_EMBED_MODEL') ?? 'nomic-embed-text';
    this.timeoutMs = Number(this.config.get('LLM_TIMEOUT_MS') ?? 30000);
    this.temperature = Number(this.config.get('LLM_TEMPERATURE') ?? 0.3);
  }

  async embed(texts: string[]): Promise<number[][]> {
    const res = await this.post('/api/embed', {
      model: this.embedModel,
      input: texts,
      truncate: true,
    });

    if (!res.ok) {
      throw new InternalServerErrorException(
        `Ollama embed failed: ${res.status} ${await res.text()}`,
      );
    }
    const json = (await res.json()) as OllamaEmbedResponse;
    return json.embeddings;
  }

  async generate(prompt: string, system?: string): Promise<string> {
    try {
      const res = await this.post('/api/generate', {
        model: this.llmModel,
        prompt,
        system,
        stream: false,
        options: { temperature: this.temperature },
      });

      if (!res.ok) {
        throw new InternalServerErrorException(
          `Ollama generate failed: ${res.status} ${await res.text()}`,
        );
      }
      const json = (await res.json()) as OllamaGenerateResponse;
      return json.response;
    } catch (error) {
      this.logger.error('Ollama generate error', error);
      throw error instanceof InternalServerErrorException
        ? error
        : new ServiceUnavailableException('LLM service unreachable');
    }
  }

  /** One non-streaming chat turn; the reply may carry tool calls. */
  async chat(
    messages: ChatMessage[],
    tools: ToolDefinition[] = [],
  ): Promise<ChatMessage> {
    try {
      const res = await this.post('/api/chat', {
        model: this.llmModel,
        messages,
        ...(tools.length > 0 ? { tools } : {}),
        stream: false,
        options: { temperature: this.temperature },
      });

      if (!res.ok) {
        throw new InternalServerErrorException(
          `Ollama chat failed: ${res.status} ${await res.text()}`,
        );
      }
      const json = (await res.json()) as OllamaChatResponse;
      return json.message;
    } catch (error) {
      this.logger.error('Ollama chat error', error);
      throw error instanceof InternalServerErrorException
        ? error
        : new ServiceUnavailableException('LLM service unreachable');
    }
  }

  /**
   * Minimal generation (a handful of tokens) used by startup checks.
   * Resolves with the HTTP status; network failures and timeouts reject.
   */
  async probe(): Promise<number> {
    const res = await this.post('/api/generate', {
      model: this.llmModel,
      prompt: 'Hello',
      stream: false,
      options: { num_predict: 5 },
    });
    return res.status;
  }

  private post(path: string, body: unknown): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    this.logger.debug(`Calling Ollama: ${url}`);
    return fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }
}
