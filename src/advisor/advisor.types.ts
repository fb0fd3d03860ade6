/** The two states of answering: a tool-using agent, then a direct completion. */
export type AdvisorState = 'agent' | 'direct';

export interface AskResult {
  answer: string;
  weather_info: string | null;
}

export interface AgentInput {
  destinationName: string;
  context: string;
  question: string;
}

export interface AgentOutcome {
  answer: string;
  /** Text of the last successful weather lookup the agent made, if any. */
  weather: string | null;
  iterations: number;
}
