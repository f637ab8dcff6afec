/**
 * LLM Provider Module
 *
 * - AnthropicProvider: Claude API (default)
 * - OllamaProvider: local models served by Ollama
 */

import { AnthropicProvider } from './anthropic-provider.js';
import { OllamaProvider } from './ollama-provider.js';
import type { LLMProvider, CreateProviderOptions } from './types.js';

/**
 * Create and initialize an LLM provider
 *
 * @example
 * const provider = await createLLMProvider({ model: 'claude-sonnet-4-20250514' });
 *
 * @example
 * const provider = await createLLMProvider({
 *   provider: 'ollama',
 *   ollamaHost: 'http://localhost:11434',
 *   model: 'qwen2.5-coder:14b'
 * });
 */
export async function createLLMProvider(options: CreateProviderOptions = {}): Promise<LLMProvider> {
  let provider: LLMProvider;

  if (options.provider === 'ollama') {
    provider = new OllamaProvider({
      host: options.ollamaHost,
      model: options.model || 'qwen2.5-coder:14b',
    });
  } else {
    provider = new AnthropicProvider({
      apiKey: options.apiKey,
      model: options.model || 'claude-sonnet-4-20250514',
    });
  }

  await provider.initialize();
  return provider;
}

export * from './types.js';
export { AnthropicProvider } from './anthropic-provider.js';
export { OllamaProvider } from './ollama-provider.js';
export { ModelRole, type ModelRoleOptions, type RoleResponse, type Role } from './role.js';
export { createFilesystemTools, type ToolExecutor } from './filesystem-tools.js';
