/**
 * Model roles
 *
 * A role is a system prompt bound to a provider and model. Every invoke()
 * starts from an empty conversation, so nothing leaks between attempts or
 * between a generator and its critic.
 */

import { TransientError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { TokenUsage } from '../agents/token-usage.js';
import type { ToolExecutor } from './filesystem-tools.js';
import type { ContentBlock, LLMMessage, LLMProvider } from './types.js';

export interface RoleResponse {
  text: string;
  usage: TokenUsage;
}

/**
 * The only thing the quality loop needs from a language model.
 */
export interface Role {
  readonly name: string;
  invoke(prompt: string): Promise<RoleResponse>;
}

export interface ModelRoleOptions {
  name: string;
  provider: LLMProvider;
  model: string;
  systemPrompt: string;
  /** When present the role may call these tools before answering */
  tools?: ToolExecutor;
  maxToolTurns?: number;
  maxTokens?: number;
  temperature?: number;
  logger?: Logger;
}

export class ModelRole implements Role {
  readonly name: string;
  private options: ModelRoleOptions;
  private logger: Logger;

  constructor(options: ModelRoleOptions) {
    this.name = options.name;
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  async invoke(prompt: string): Promise<RoleResponse> {
    const { provider, model, systemPrompt, tools } = this.options;
    const maxTurns = tools ? this.options.maxToolTurns ?? 20 : 1;
    const messages: LLMMessage[] = [{ role: 'user', content: prompt }];
    const usage = new TokenUsage();
    let text = '';

    for (let turn = 1; turn <= maxTurns; turn++) {
      const response = await provider.chat(messages, tools?.tools ?? [], {
        model,
        systemPrompt,
        maxTokens: this.options.maxTokens ?? 8192,
        temperature: this.options.temperature,
      });
      usage.add(TokenUsage.fromCall(response.usage.inputTokens, response.usage.outputTokens));

      if (response.stopReason === 'error') {
        throw new TransientError(`${this.name}: model call failed`);
      }

      text = response.content;
      this.logger.debug(
        `${this.name} turn ${turn}: stop=${response.stopReason} in=${response.usage.inputTokens} out=${response.usage.outputTokens} tools=${response.toolCalls.length}`
      );

      if (!tools || response.toolCalls.length === 0) {
        return { text, usage };
      }

      const assistantContent: ContentBlock[] = [];
      if (response.content) {
        assistantContent.push({ type: 'text', text: response.content });
      }
      const toolResults: ContentBlock[] = [];

      for (const call of response.toolCalls) {
        assistantContent.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
        const result = await tools.execute(call.name, call.arguments);
        toolResults.push({ type: 'tool_result', tool_use_id: call.id, content: result });
      }

      messages.push({ role: 'assistant', content: assistantContent });
      messages.push({ role: 'user', content: toolResults });
    }

    this.logger.warn(`${this.name} reached max tool turns (${maxTurns}) before answering`);
    return { text, usage };
  }
}
