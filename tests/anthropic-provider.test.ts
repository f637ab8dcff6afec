/**
 * Tests for the Anthropic provider's request and response conversion
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AnthropicProvider } from '../src/llm/anthropic-provider.js';
import { PermanentError, TransientError } from '../src/errors.js';

interface SdkState {
  requests: unknown[];
  clientOptions: unknown[];
  response: unknown;
  failStatus: number | null;
}

const sdk = vi.hoisted(() => {
  const state: SdkState = { requests: [], clientOptions: [], response: null, failStatus: null };
  return state;
});

vi.mock('@anthropic-ai/sdk', () => {
  class APIError extends Error {
    status: number | undefined;

    constructor(status: number | undefined, message: string) {
      super(message);
      this.status = status;
    }
  }

  class Anthropic {
    static APIError = APIError;

    messages = {
      create: async (body: unknown) => {
        sdk.requests.push(body);
        if (sdk.failStatus !== null) {
          throw new APIError(sdk.failStatus, 'boom');
        }
        return sdk.response;
      },
    };

    constructor(options: unknown) {
      sdk.clientOptions.push(options);
    }
  }

  return { default: Anthropic };
});

describe('AnthropicProvider', () => {
  beforeEach(() => {
    sdk.requests = [];
    sdk.clientOptions = [];
    sdk.failStatus = null;
    sdk.response = {
      content: [
        { type: 'text', text: 'Looking' },
        { type: 'tool_use', id: 't2', name: 'list_directory', input: { path: '.' } },
      ],
      stop_reason: 'tool_use',
      usage: { input_tokens: 12, output_tokens: 3 },
    };
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('needs an API key', async () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    await expect(new AnthropicProvider().initialize()).rejects.toThrow(PermanentError);
  });

  it('falls back to the environment key', async () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');
    await new AnthropicProvider().initialize();
    expect(sdk.clientOptions).toEqual([{ apiKey: 'test-secret' }]);
  });

  it('refuses to chat before initialize', async () => {
    await expect(new AnthropicProvider({ apiKey: 'test-secret' }).chat([], [], { maxTokens: 10 })).rejects.toThrow(
      'Provider not initialized. Call initialize() first.'
    );
  });

  it('converts messages and tools, and parses tool calls', async () => {
    const provider = new AnthropicProvider({ apiKey: 'test-secret' });
    await provider.initialize();

    const result = await provider.chat(
      [
        { role: 'system', content: 'ignored here' },
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: [{ type: 'tool_use', id: 't1', name: 'read_file', input: { path: 'a.ts' } }] },
        { role: 'tool', content: 'file body', toolCallId: 't1' },
      ],
      [{ name: 'read_file', description: 'Read', parameters: { type: 'object', properties: { path: { type: 'string' } } } }],
      { maxTokens: 100, systemPrompt: 'sys' }
    );

    expect(sdk.requests).toEqual([
      {
        model: 'claude-sonnet-4-20250514',
        max_tokens: 100,
        system: 'sys',
        tools: [{ name: 'read_file', description: 'Read', input_schema: { type: 'object', properties: { path: { type: 'string' } } } }],
        messages: [
          { role: 'user', content: 'hi' },
          { role: 'assistant', content: [{ type: 'tool_use', id: 't1', name: 'read_file', input: { path: 'a.ts' } }] },
          { role: 'user', content: [{ type: 'tool_result', tool_use_id: 't1', content: 'file body' }] },
        ],
      },
    ]);
    expect(result).toEqual({
      content: 'Looking',
      toolCalls: [{ id: 't2', name: 'list_directory', arguments: { path: '.' } }],
      stopReason: 'tool_use',
      usage: { inputTokens: 12, outputTokens: 3 },
    });
  });

  it('uses a per-request model override', async () => {
    const provider = new AnthropicProvider({ apiKey: 'test-secret', model: 'base-model' });
    await provider.initialize();
    await provider.chat([{ role: 'user', content: 'hi' }], [], { maxTokens: 10, model: 'critic-model' });
    expect(sdk.requests).toMatchObject([{ model: 'critic-model' }]);
  });

  it('classifies API failures', async () => {
    const provider = new AnthropicProvider({ apiKey: 'test-secret' });
    await provider.initialize();
    const ask = () => provider.chat([{ role: 'user', content: 'hi' }], [], { maxTokens: 10 });

    sdk.failStatus = 401;
    await expect(ask()).rejects.toThrow(PermanentError);
    sdk.failStatus = 429;
    await expect(ask()).rejects.toThrow(TransientError);
    sdk.failStatus = 503;
    await expect(ask()).rejects.toThrow('Anthropic API unavailable (503): boom');
    sdk.failStatus = 400;
    await expect(ask()).rejects.toThrow('boom');
  });
});
