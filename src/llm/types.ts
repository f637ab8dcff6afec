/**
 * LLM Provider Types
 *
 * Shared types for the Anthropic and Ollama providers and the model roles
 * built on top of them.
 */

// JSON Schema type for tool parameters
export type JSONSchema = {
  type?: string;
  properties?: Record<string, JSONSchema>;
  required?: string[];
  items?: JSONSchema;
  description?: string;
  enum?: string[];
  [key: string]: unknown;
};

export interface TextContentBlock {
  type: 'text';
  text: string;
}

export interface ToolUseContentBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultContentBlock {
  type: 'tool_result';
  tool_use_id: string;
  content: string;
  is_error?: boolean;
}

export type ContentBlock = TextContentBlock | ToolUseContentBlock | ToolResultContentBlock;

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string | ContentBlock[];
  toolCallId?: string;
}

export interface LLMTool {
  name: string;
  description: string;
  parameters: JSONSchema;
}

export interface LLMToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface LLMResponse {
  content: string;
  toolCalls: LLMToolCall[];
  stopReason: 'end_turn' | 'tool_use' | 'max_tokens' | 'error';
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface LLMProviderOptions {
  maxTokens: number;
  temperature?: number;
  systemPrompt?: string;
  stopSequences?: string[];
  /** Model override for this request; providers fall back to their own model */
  model?: string;
}

export interface ModelInfo {
  name: string;
  contextLength: number;
  supportsTools: boolean;
  isLocal: boolean;
}

/**
 * Base interface for all LLM providers
 */
export interface LLMProvider {
  /**
   * Connect and verify credentials. Must be called before chat().
   */
  initialize(): Promise<void>;

  chat(messages: LLMMessage[], tools: LLMTool[], options: LLMProviderOptions): Promise<LLMResponse>;

  shutdown(): Promise<void>;

  getModelInfo(): ModelInfo;
}

export interface CreateProviderOptions {
  provider?: 'anthropic' | 'ollama';
  apiKey?: string;
  model?: string;
  ollamaHost?: string;
}
