import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { readFlag } from '../config/env.validation';
import { requireNonEmpty, requirePositiveId } from '../common/validation';
import { DestinationsService } from '../destinations/destinations.service';
import type { Destination } from '../destinations/destinations.types';
import {
  TRAVEL_EVENTS,
  type QuestionAnsweredEvent,
} from '../events/travel.events';
import { NoteIndexService } from '../knowledge/note-index.service';
import { NotesRepository } from '../notes/notes.repository';
import { OllamaService } from '../ollama/ollama.service';
import { WeatherService } from '../weather/weather.service';
import { AdvisorAgent } from './advisor.agent';
import {
  APOLOGY,
  composeDirectPrompt,
  contextFallback,
  isWeatherQuestion,
} from './advisor.prompts';
import type { AdvisorState, AgentOutcome, AskResult } from './advisor.types';

@Injectable()
export class AdvisorService {
  private readonly logger = new Logger(AdvisorService.name);
  private readonly topK: number;
  private readonly agentEnabled: boolean;

  constructor(
    private readonly config: ConfigService,
    private readonly destinations: DestinationsService,
    private readonly notes: NotesRepository,
    private readonly index: NoteIndexService,
    private readonly agent: AdvisorAgent,
    private readonly weather: WeatherService,
    private readonly ollama: OllamaService,
    private readonly eventEmitter: EventEmitter2,
  ) {
    this.topK = Number(this.config.get('RAG_TOP_K') ?? 2);
    this.agentEnabled = readFlag(this.config.get('AGENT_ENABLED'), true);
  }

  /**
   * Answers a question about one destination. Input errors and unknown
   * destinations surface as HTTP errors; anything past that point degrades
   * to a textual answer.
   */
  async ask(destinationId: number, rawQuestion: string): Promise<AskResult> {
    requirePositiveId(destinationId);
    const question = requireNonEmpty(rawQuestion, 'Question');
    const destination = await this.destinations.require(destinationId);

    try {
      const result = await this.answer(destination, question);
      this.logger.log(`AI query processed for destination ${destinationId}`);
      return result;
    } catch (error) {
      this.logger.error(`AI service error for destination ${destinationId}`, error);
      return { answer: APOLOGY, weather_info: null };
    }
  }

  private async answer(destination: Destination, question: string): Promise<AskResult> {
    const chunks = await this.retrieveContext(destination.id, question);
    const context = chunks.join('\n');

    let state: AdvisorState = this.agentEnabled ? 'agent' : 'direct';

    if (state === 'agent') {
      const outcome = await this.attemptAgent(destination, context, question);
      if (outcome) {
        this.emitAnswered(destination.id, question, state, chunks.length, outcome.weather !== null);
        return { answer: outcome.answer, weather_info: outcome.weather };
      }
      state = 'direct';
    }

    const lookup = isWeatherQuestion(question)
      ? await this.weather.lookup(destination.name)
      : null;
    const answer = await this.generateAnswer(question, context, lookup?.text ?? null);
    const weatherInfo = lookup?.ok ? lookup.text : null;

    this.emitAnswered(destination.id, question, state, chunks.length, weatherInfo !== null);
    return { answer, weather_info: weatherInfo };
  }

  private async retrieveContext(destinationId: number, question: string): Promise<string[]> {
    try {
      const notes = await this.notes.findByDestination(destinationId);
      if (notes.length === 0) {
        this.logger.log(`No knowledge entries found for destination ${destinationId}`);
        return [];
      }
      await this.index.sync(destinationId, notes);
      return await this.index.retrieve(destinationId, question, this.topK);
    } catch (error) {
      this.logger.error(`Error building context for destination ${destinationId}`, error);
      return [];
    }
  }

  private async attemptAgent(
    destination: Destination,
    context: string,
    question: string,
  ): Promise<AgentOutcome | null> {
    try {
      return await this.agent.run({
        destinationName: destination.name,
        context,
        question,
      });
    } catch (error) {
      this.logger.error(`Agent error: ${(error as Error).message}`);
      return null;
    }
  }

  async generateAnswer(
    question: string,
    context: string,
    weather: string | null,
  ): Promise<string> {
    const prompt = composeDirectPrompt(question, context, weather);
    try {
      const response = (await this.ollama.generate(prompt)).trim();
      return response || contextFallback(context);
    } catch (error) {
      this.logger.error(`LLM generation error: ${(error as Error).message}`);
      return contextFallback(context);
    }
  }

  private emitAnswered(
    destinationId: number,
    question: string,
    mode: AdvisorState,
    chunksUsed: number,
    weatherConsulted: boolean,
  ): void {
    this.eventEmitter.emit(TRAVEL_EVENTS.QUESTION_ANSWERED, {
      destinationId,
      question,
      mode,
      chunksUsed,
      weatherConsulted,
    } satisfies QuestionAnsweredEvent);
  }
}
