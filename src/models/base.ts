/**
 * Base model interfaces and types
 */

export interface Message {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  tool_calls?: ToolCall[];
  tool_call_id?: string;
}

export interface ToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

export interface ModelUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ResponseFormat {
  type: 'json_schema';
  json_schema: {
    name: string;
    schema: object;
    strict?: boolean;
  };
}

export interface ModelResponse {
  content: string;
  usage?: ModelUsage;
}

export interface ChatCompletionOptions {
  model?: string;
  messages: readonly Message[];
  responseFormat?: ResponseFormat;
  temperature?: number;
  maxTokens?: number;
}

export interface IModel {
  chat(options: ChatCompletionOptions): Promise<ModelResponse>;
}
