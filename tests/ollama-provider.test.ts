/**
 * Tests for the Ollama provider's model check and message conversion
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { OllamaProvider } from '../src/llm/ollama-provider.js';
import { PermanentError, TransientError } from '../src/errors.js';
import type { Logger } from '../src/logger.js';

interface OllamaState {
  hosts: unknown[];
  models: Array<{ name: string }>;
  listError: Error | null;
  chatError: Error | null;
  requests: unknown[];
  response: unknown;
}

const ollama = vi.hoisted(() => {
  const state: OllamaState = { hosts: [], models: [], listError: null, chatError: null, requests: [], response: null };
  return state;
});

vi.mock('ollama', () => ({
  Ollama: class {
    constructor(config: unknown) {
      ollama.hosts.push(config);
    }

    async list() {
      if (ollama.listError) throw ollama.listError;
      return { models: ollama.models };
    }

    async chat(request: unknown) {
      ollama.requests.push(request);
      if (ollama.chatError) throw ollama.chatError;
      return ollama.response;
    }
  },
}));

function recordingLogger(warnings: string[]): Logger {
  const logger: Logger = {
    debug: () => {},
    info: () => {},
    warn: (message) => {
      warnings.push(message);
    },
    error: () => {},
    child: () => logger,
  };
  return logger;
}

describe('OllamaProvider', () => {
  beforeEach(() => {
    ollama.hosts = [];
    ollama.models = [{ name: 'llama3:latest' }];
    ollama.listError = null;
    ollama.chatError = null;
    ollama.requests = [];
    ollama.response = { message: { role: 'assistant', content: 'Done' } };
  });

  it('connects to the configured host', async () => {
    await new OllamaProvider({ host: 'http://ollama-host:11434', model: 'llama3' }).initialize();
    expect(ollama.hosts).toEqual([{ host: 'http://ollama-host:11434' }]);
  });

  it('reports an unreachable server as transient', async () => {
    ollama.listError = new Error('fetch failed');
    const pending = new OllamaProvider({ host: 'http://ollama-host:11434', model: 'llama3' }).initialize();

    await expect(pending).rejects.toThrow(TransientError);
    await expect(pending).rejects.toThrow('Cannot connect to Ollama at http://ollama-host:11434');
  });

  it('passes other listing failures through', async () => {
    ollama.listError = new Error('unexpected reply');
    await expect(new OllamaProvider({ model: 'llama3' }).initialize()).rejects.toThrow('unexpected reply');
  });

  it('rejects a model that has not been pulled', async () => {
    ollama.models = [{ name: 'mistral:7b' }];
    const pending = new OllamaProvider({ model: 'llama3' }).initialize();

    await expect(pending).rejects.toThrow(PermanentError);
    await expect(pending).rejects.toThrow("Model 'llama3' not found in Ollama.");
  });

  it('accepts a model listed under a tag', async () => {
    ollama.models = [{ name: 'llama3:8b' }];
    await expect(new OllamaProvider({ model: 'llama3' }).initialize()).resolves.toBeUndefined();
  });

  it('refuses to chat before initialize', async () => {
    await expect(new OllamaProvider({ model: 'llama3' }).chat([], [], { maxTokens: 10 })).rejects.toThrow(
      'Provider not initialized. Call initialize() first.'
    );
  });

  it('converts messages and tools, and numbers tool calls', async () => {
    ollama.response = {
      message: {
        role: 'assistant',
        content: '',
        tool_calls: [
          { function: { name: 'list_directory', arguments: { path: '.' } } },
          { function: { name: 'read_file', arguments: { path: 'b.ts' } } },
        ],
      },
      prompt_eval_count: 20,
      eval_count: 5,
    };
    const provider = new OllamaProvider({ model: 'llama3' });
    await provider.initialize();

    const result = await provider.chat(
      [
        { role: 'user', content: 'hi' },
        {
          role: 'assistant',
          content: [
            { type: 'text', text: 'Checking' },
            { type: 'tool_use', id: 't1', name: 'read_file', input: { path: 'a.ts' } },
          ],
        },
        { role: 'tool', content: [{ type: 'tool_result', tool_use_id: 't1', content: 'file body' }], toolCallId: 't1' },
      ],
      [
        {
          name: 'read_file',
          description: 'Read',
          parameters: {
            type: 'object',
            properties: { path: { type: 'string', description: 'File path' }, mode: { enum: ['text', 'raw'] } },
            required: ['path'],
          },
        },
      ],
      { maxTokens: 200, systemPrompt: 'sys', stopSequences: ['END'] }
    );

    expect(ollama.requests).toEqual([
      {
        model: 'llama3',
        messages: [
          { role: 'system', content: 'sys' },
          { role: 'user', content: 'hi' },
          { role: 'assistant', content: 'Checking', tool_calls: [{ function: { name: 'read_file', arguments: { path: 'a.ts' } } }] },
          { role: 'tool', content: 'file body' },
        ],
        tools: [
          {
            type: 'function',
            function: {
              name: 'read_file',
              description: 'Read',
              parameters: {
                type: 'object',
                required: ['path'],
                properties: {
                  path: { type: 'string', description: 'File path' },
                  mode: { type: 'string', description: '', enum: ['text', 'raw'] },
                },
              },
            },
          },
        ],
        options: { num_predict: 200, temperature: 0.7, stop: ['END'] },
      },
    ]);
    expect(result).toEqual({
      content: '',
      toolCalls: [
        { id: 'call_1', name: 'list_directory', arguments: { path: '.' } },
        { id: 'call_2', name: 'read_file', arguments: { path: 'b.ts' } },
      ],
      stopReason: 'tool_use',
      usage: { inputTokens: 20, outputTokens: 5 },
    });
  });

  it('sends no tools and honours a per-request model', async () => {
    const provider = new OllamaProvider({ model: 'llama3' });
    await provider.initialize();

    const result = await provider.chat([{ role: 'user', content: 'hi' }], [], { maxTokens: 10, model: 'critic-model', temperature: 0 });

    expect(ollama.requests).toEqual([
      {
        model: 'critic-model',
        messages: [{ role: 'user', content: 'hi' }],
        tools: undefined,
        options: { num_predict: 10, temperature: 0, stop: undefined },
      },
    ]);
    expect(result).toEqual({ content: 'Done', toolCalls: [], stopReason: 'end_turn', usage: { inputTokens: 0, outputTokens: 0 } });
  });

  it('turns a chat failure into an error stop and logs it', async () => {
    const warnings: string[] = [];
    ollama.chatError = new Error('model crashed');
    const provider = new OllamaProvider({ model: 'llama3', logger: recordingLogger(warnings) });
    await provider.initialize();

    const result = await provider.chat([{ role: 'user', content: 'hi' }], [], { maxTokens: 10 });

    expect(result).toEqual({ content: '', toolCalls: [], stopReason: 'error', usage: { inputTokens: 0, outputTokens: 0 } });
    expect(warnings).toEqual(['chat error: model crashed']);
  });
});
