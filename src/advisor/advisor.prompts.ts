import type { ToolDefinition } from '../ollama/ollama.types';
import type { AgentInput } from './advisor.types';

export const AGENT_SYSTEM_PROMPT =
  'You are a concise AI travel advisor. Answer questions about destinations using the provided context. ' +
  'Only use the weather tool if users specifically ask about weather or temperature. ' +
  'Keep responses focused and relevant to the question asked.';

export const WEATHER_TOOL_NAME = 'get_weather';

export const WEATHER_TOOL: ToolDefinition = {
  type: 'function',
  function: {
    name: WEATHER_TOOL_NAME,
    description:
      'Get current weather for a destination. Only use when users specifically ask about weather or temperature.',
    parameters: {
      type: 'object',
      properties: {
        destination: {
          type: 'string',
          description: 'Name of the destination, e.g. "Paris"',
        },
      },
      required: ['destination'],
    },
  },
};

export const TECHNICAL_DIFFICULTIES =
  "I'm experiencing technical difficulties. Please try again later.";

export const APOLOGY =
  "I apologize, but I'm experiencing technical difficulties. Please try again later or contact support if the issue persists.";

const WEATHER_WORDS =
  /\b(weather|temperature|forecast|rain(?:ing|y)?|sunny|snow(?:ing|y)?|wind(?:y)?|hot|cold|warm|umbrella)\b/i;

export function isWeatherQuestion(question: string): boolean {
  return WEATHER_WORDS.test(question);
}

export function composeAgentInput(input: AgentInput): string {
  return `Destination: ${input.destinationName}\nContext: ${input.context}\nQuestion: ${input.question}`;
}

export function composeDirectPrompt(
  question: string,
  context: string,
  weather: string | null,
): string {
  const parts: string[] = [];
  if (context) parts.push(`Context: ${context}`);
  if (weather) parts.push(`Weather: ${weather}`);
  parts.push(`Question: ${question}`);
  parts.push('Provide a concise, helpful answer based on the available information.');
  return parts.join('\n');
}

export function contextFallback(context: string): string {
  return context
    ? `Based on available information: ${context.slice(0, 200)}...`
    : TECHNICAL_DIFFICULTIES;
}
