export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCall {
  function: {
    name: string;
    arguments: Record<string, unknown>;
  };
}

export interface ChatMessage {
  role: ChatRole;
  content: string;
  tool_calls?: ToolCall[];
  tool_name?: string;
}

export interface ToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, { type: string; description?: string }>;
      required?: string[];
    };
  };
}

export type OllamaEmbedResponse = {
  model: string;
  embeddings: number[][];
};

export type OllamaGenerateResponse = {
  model: string;
  response: string;
  done: boolean;
};

export type OllamaChatResponse = {
  model: string;
  message: ChatMessage;
  done: boolean;
};
