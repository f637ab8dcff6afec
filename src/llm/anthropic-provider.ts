/**
 * Anthropic Provider
 *
 * LLM provider backed by the Anthropic Messages API. This is the default
 * provider for both generator and critic roles.
 */

import Anthropic from '@anthropic-ai/sdk';
import { PermanentError, TransientError } from '../errors.js';
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

export interface AnthropicProviderOptions {
  /** Falls back to ANTHROPIC_API_KEY */
  apiKey?: string;
  model?: string;
}

export class AnthropicProvider implements LLMProvider {
  private client: Anthropic | null = null;
  private modelName: string;
  private apiKey?: string;

  constructor(options: AnthropicProviderOptions = {}) {
    this.apiKey = options.apiKey;
    this.modelName = options.model || 'claude-sonnet-4-20250514';
  }

  async initialize(): Promise<void> {
    const key = this.apiKey || process.env.ANTHROPIC_API_KEY;

    if (!key) {
      throw new PermanentError(
        'Anthropic API key not found.\n\n' +
          'Set it via:\n' +
          '  1. Environment variable: ANTHROPIC_API_KEY=your-key\n' +
          '  2. Or switch provider: WIKIFORGE_PROVIDER=ollama'
      );
    }

    this.client = new Anthropic({ apiKey: key });
  }

  async chat(messages: LLMMessage[], tools: LLMTool[], options: LLMProviderOptions): Promise<LLMResponse> {
    if (!this.client) {
      throw new Error('Provider not initialized. Call initialize() first.');
    }

    const anthropicTools = this.convertTools(tools);

    try {
      const response = await this.client.messages.create({
        model: options.model || this.modelName,
        max_tokens: options.maxTokens,
        system: options.systemPrompt,
        temperature: options.temperature,
        tools: anthropicTools.length > 0 ? anthropicTools : undefined,
        messages: this.convertMessages(messages),
        stop_sequences: options.stopSequences,
      });

      return this.parseResponse(response);
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        if (error.status === 401) {
          throw new PermanentError('Invalid Anthropic API key. Please check your ANTHROPIC_API_KEY.', { cause: error });
        }
        if (error.status === 429) {
          throw new TransientError('Rate limited by Anthropic API. Please wait and try again.', { cause: error });
        }
        if (error.status !== undefined && error.status >= 500) {
          throw new TransientError(`Anthropic API unavailable (${error.status}): ${error.message}`, { cause: error });
        }
      }

      throw error;
    }
  }

  async shutdown(): Promise<void> {
    this.client = null;
  }

  getModelInfo(): ModelInfo {
    return {
      name: this.modelName,
      contextLength: 200000,
      supportsTools: true,
      isLocal: false,
    };
  }

  /**
   * Convert messages to Anthropic format. System messages travel in the
   * `system` parameter instead.
   */
  private convertMessages(messages: LLMMessage[]): Anthropic.MessageParam[] {
    const result: Anthropic.MessageParam[] = [];

    for (const msg of messages) {
      if (msg.role === 'system') {
        continue;
      }

      if (msg.role === 'tool') {
        // Tool results go back as user messages
        const content = typeof msg.content === 'string' ? msg.content : this.joinText(msg.content);
        result.push({
          role: 'user',
          content: [{ type: 'tool_result', tool_use_id: msg.toolCallId || '', content }],
        });
        continue;
      }

      if (typeof msg.content === 'string') {
        result.push({ role: msg.role, content: msg.content });
      } else {
        result.push({ role: msg.role, content: msg.content.map((block) => this.convertContentBlock(block)) });
      }
    }

    return result;
  }

  private convertContentBlock(
    block: ContentBlock
  ): Anthropic.TextBlockParam | Anthropic.ToolUseBlockParam | Anthropic.ToolResultBlockParam {
    switch (block.type) {
      case 'text':
        return { type: 'text', text: block.text };
      case 'tool_use':
        return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
      case 'tool_result':
        return {
          type: 'tool_result',
          tool_use_id: block.tool_use_id,
          content: block.content,
          is_error: block.is_error,
        };
    }
  }

  private joinText(blocks: ContentBlock[]): string {
    return blocks
      .map((block) => (block.type === 'text' ? block.text : block.type === 'tool_result' ? block.content : ''))
      .join('\n');
  }

  private convertTools(tools: LLMTool[]): Anthropic.Tool[] {
    return tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: { ...tool.parameters, type: 'object' as const },
    }));
  }

  private parseResponse(response: Anthropic.Message): LLMResponse {
    const toolCalls: LLMToolCall[] = [];
    let textContent = '';

    for (const block of response.content) {
      if (block.type === 'text') {
        textContent += block.text;
      } else if (block.type === 'tool_use') {
        toolCalls.push({
          id: block.id,
          name: block.name,
          arguments: isRecord(block.input) ? block.input : {},
        });
      }
    }

    let stopReason: LLMResponse['stopReason'] = 'end_turn';
    if (response.stop_reason === 'tool_use') {
      stopReason = 'tool_use';
    } else if (response.stop_reason === 'max_tokens') {
      stopReason = 'max_tokens';
    }

    return {
      content: textContent,
      toolCalls,
      stopReason,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export default AnthropicProvider;
