/**
 * Ollama Provider
 *
 * LLM provider that talks to an Ollama server, for running the generator
 * and critic roles against local models.
 */

import { PermanentError, TransientError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type {
  LLMProvider,
  LLMMessage,
  LLMTool,
  LLMToolCall,
  LLMResponse,
  LLMProviderOptions,
  ModelInfo,
  ContentBlock,
} from './types.js';

// Loaded lazily so the Anthropic path never pulls in the Ollama client
type OllamaClient = import('ollama').Ollama;
type OllamaMessage = import('ollama').Message;
type OllamaChatResponse = import('ollama').ChatResponse;

export interface OllamaProviderOptions {
  /** Default: http://localhost:11434 */
  host?: string;
  model: string;
  logger?: Logger;
}

export class OllamaProvider implements LLMProvider {
  private client: OllamaClient | null = null;
  private modelName: string;
  private host: string;
  private callCounter = 0;
  private logger: Logger;

  constructor(options: OllamaProviderOptions) {
    this.host = options.host || 'http://localhost:11434';
    this.modelName = options.model;
    this.logger = options.logger ?? createLogger('ollama');
  }

  /**
   * Connect and check that the model has been pulled
   */
  async initialize(): Promise<void> {
    const { Ollama } = await import('ollama');
    this.client = new Ollama({ host: this.host });

    let available: string[];
    try {
      const models = await this.client.list();
      available = models.models.map((m) => m.name);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (message.includes('ECONNREFUSED') || message.includes('fetch failed')) {
        throw new TransientError(
          `Cannot connect to Ollama at ${this.host}\n\n` + `  Ensure Ollama is running:\n` + `    $ ollama serve`,
          { cause: error }
        );
      }
      throw error;
    }

    const hasModel = available.some((name) => name === this.modelName || name.startsWith(this.modelName + ':'));
    if (!hasModel) {
      throw new PermanentError(
        `Model '${this.modelName}' not found in Ollama.\n\n` +
          `   Available models:\n     - ${available.join('\n     - ') || '(none)'}\n\n` +
          `   Pull it with: ollama pull ${this.modelName}`
      );
    }
  }

  async chat(messages: LLMMessage[], tools: LLMTool[], options: LLMProviderOptions): Promise<LLMResponse> {
    if (!this.client) {
      throw new Error('Provider not initialized. Call initialize() first.');
    }

    const ollamaTools = this.convertTools(tools);

    try {
      const response = await this.client.chat({
        model: options.model || this.modelName,
        messages: this.convertMessages(messages, options.systemPrompt),
        tools: ollamaTools.length > 0 ? ollamaTools : undefined,
        options: {
          num_predict: options.maxTokens,
          temperature: options.temperature ?? 0.7,
          stop: options.stopSequences,
        },
      });

      return this.parseResponse(response);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(`chat error: ${err.message}`);
      return {
        content: '',
        toolCalls: [],
        stopReason: 'error',
        usage: { inputTokens: 0, outputTokens: 0 },
      };
    }
  }

  async shutdown(): Promise<void> {
    this.client = null;
  }

  getModelInfo(): ModelInfo {
    return {
      name: this.modelName,
      contextLength: 32768, // varies by model
      supportsTools: true,
      isLocal: true,
    };
  }

  private convertMessages(messages: LLMMessage[], systemPrompt?: string): OllamaMessage[] {
    const result: OllamaMessage[] = [];

    if (systemPrompt) {
      result.push({ role: 'system', content: systemPrompt });
    }

    for (const msg of messages) {
      const content = this.extractTextContent(msg.content);

      if (msg.role === 'assistant') {
        const toolCalls = this.extractToolCalls(msg.content);
        if (toolCalls.length > 0) {
          result.push({
            role: 'assistant',
            content,
            tool_calls: toolCalls.map((tc) => ({ function: { name: tc.name, arguments: tc.arguments } })),
          });
          continue;
        }
      }

      result.push({ role: msg.role, content });
    }

    return result;
  }

  private extractTextContent(content: string | ContentBlock[]): string {
    if (typeof content === 'string') {
      return content;
    }

    const parts: string[] = [];
    for (const block of content) {
      if (block.type === 'text') parts.push(block.text);
      else if (block.type === 'tool_result') parts.push(block.content);
    }
    return parts.join('\n');
  }

  private extractToolCalls(content: string | ContentBlock[]): LLMToolCall[] {
    if (typeof content === 'string') {
      return [];
    }

    const calls: LLMToolCall[] = [];
    for (const block of content) {
      if (block.type === 'tool_use') {
        calls.push({ id: block.id, name: block.name, arguments: block.input });
      }
    }
    return calls;
  }

  private convertTools(tools: LLMTool[]) {
    return tools.map((tool) => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: {
          type: 'object',
          required: tool.parameters.required ?? [],
          properties: Object.fromEntries(
            Object.entries(tool.parameters.properties ?? {}).map(([name, schema]) => [
              name,
              {
                type: schema.type ?? 'string',
                description: schema.description ?? '',
                ...(schema.enum ? { enum: schema.enum } : {}),
              },
            ])
          ),
        },
      },
    }));
  }

  private parseResponse(response: OllamaChatResponse): LLMResponse {
    const toolCalls: LLMToolCall[] = (response.message.tool_calls ?? []).map((call) => ({
      id: `call_${++this.callCounter}`,
      name: call.function.name,
      arguments: call.function.arguments,
    }));

    return {
      content: response.message.content || '',
      toolCalls,
      stopReason: toolCalls.length > 0 ? 'tool_use' : 'end_turn',
      usage: {
        inputTokens: response.prompt_eval_count || 0,
        outputTokens: response.eval_count || 0,
      },
    };
  }
}

export default OllamaProvider;
