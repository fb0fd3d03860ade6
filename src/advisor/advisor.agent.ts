import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaService } from '../ollama/ollama.service';
import type { ChatMessage, ToolCall } from '../ollama/ollama.types';
import { WeatherService } from '../weather/weather.service';
import {
  AGENT_SYSTEM_PROMPT,
  WEATHER_TOOL,
  WEATHER_TOOL_NAME,
  composeAgentInput,
} from './advisor.prompts';
import type { AgentInput, AgentOutcome } from './advisor.types';

interface ToolResult {
  content: string;
  weather: string | null;
}

/**
 * Tool-calling loop over the chat endpoint. Each iteration is one model
 * turn; tool results are fed back until the model answers in plain text.
 * Returns null when the iteration budget runs out without an answer.
 */
@Injectable()
export class AdvisorAgent {
  private readonly logger = new Logger(AdvisorAgent.name);
  readonly maxIterations: number;

  constructor(
    private readonly config: ConfigService,
    private readonly ollama: OllamaService,
    private readonly weather: WeatherService,
  ) {
    this.maxIterations = Number(this.config.get('AGENT_MAX_ITERATIONS') ?? 3);
  }

  async run(input: AgentInput): Promise<AgentOutcome | null> {
    const messages: ChatMessage[] = [
      { role: 'system', content: AGENT_SYSTEM_PROMPT },
      { role: 'user', content: composeAgentInput(input) },
    ];
    let weather: string | null = null;

    for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
      const reply = await this.ollama.chat(messages, [WEATHER_TOOL]);
      messages.push(reply);

      const calls = reply.tool_calls ?? [];
      if (calls.length === 0) {
        const answer = reply.content.trim();
        return answer ? { answer, weather, iterations: iteration } : null;
      }

      for (const call of calls) {
        const result = await this.runTool(call, input.destinationName);
        if (result.weather) weather = result.weather;
        messages.push({
          role: 'tool',
          tool_name: call.function.name,
          content: result.content,
        });
      }
    }

    this.logger.warn(
      `Agent stopped after ${this.maxIterations} iterations without an answer`,
    );
    return null;
  }

  private async runTool(call: ToolCall, fallbackDestination: string): Promise<ToolResult> {
    if (call.function.name !== WEATHER_TOOL_NAME) {
      this.logger.warn(`Agent requested unknown tool "${call.function.name}"`);
      return { content: `Unknown tool: ${call.function.name}`, weather: null };
    }

    const requested: unknown = call.function.arguments?.destination;
    const destination =
      typeof requested === 'string' && requested.trim()
        ? requested.trim()
        : fallbackDestination;

    const lookup = await this.weather.lookup(destination);
    return { content: lookup.text, weather: lookup.ok ? lookup.text : null };
  }
}
