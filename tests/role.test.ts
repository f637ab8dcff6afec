/**
 * Tests for model roles and the repository tools they can call
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import { ModelRole } from '../src/llm/role.js';
import { createFilesystemTools } from '../src/llm/filesystem-tools.js';
import { TransientError } from '../src/errors.js';
import type { LLMMessage, LLMProvider, LLMResponse, LLMTool, LLMProviderOptions } from '../src/llm/types.js';
import { makeTempDir, writeFiles } from './helpers.js';

function response(partial: Partial<LLMResponse>): LLMResponse {
  return { content: '', toolCalls: [], stopReason: 'end_turn', usage: { inputTokens: 10, outputTokens: 5 }, ...partial };
}

class FakeProvider implements LLMProvider {
  seen: Array<{ messages: LLMMessage[]; tools: LLMTool[]; options: LLMProviderOptions }> = [];

  constructor(private responses: LLMResponse[]) {}

  async initialize(): Promise<void> {}

  async chat(messages: LLMMessage[], tools: LLMTool[], options: LLMProviderOptions): Promise<LLMResponse> {
    this.seen.push({ messages: structuredClone(messages), tools, options });
    const next = this.responses.shift();
    if (!next) throw new Error('no scripted response left');
    return next;
  }

  async shutdown(): Promise<void> {}

  getModelInfo() {
    return { name: 'fake', contextLength: 1000, supportsTools: true, isLocal: true };
  }
}

describe('ModelRole', () => {
  let repo: string;

  beforeEach(() => {
    repo = makeTempDir();
    writeFiles(repo, { 'src/app.ts': 'console.log("hi");\n' });
  });

  afterEach(() => {
    fs.rmSync(repo, { recursive: true, force: true });
  });

  it('answers a plain prompt in one call', async () => {
    const provider = new FakeProvider([response({ content: 'done' })]);
    const role = new ModelRole({ name: 'pageCritic', provider, model: 'model-a', systemPrompt: 'Judge it.' });

    const result = await role.invoke('Review this');

    expect(result.text).toBe('done');
    expect(result.usage.toJSON()).toEqual({ inputTokens: 10, outputTokens: 5, totalTokens: 15, calls: 1 });
    expect(provider.seen[0].options).toMatchObject({ model: 'model-a', systemPrompt: 'Judge it.', maxTokens: 8192 });
    expect(provider.seen[0].tools).toEqual([]);
  });

  it('runs tool calls and feeds their results back', async () => {
    const provider = new FakeProvider([
      response({
        content: 'Let me look.',
        stopReason: 'tool_use',
        toolCalls: [{ id: 'call-1', name: 'read_file', arguments: { path: 'src/app.ts' } }],
      }),
      response({ content: '# App page' }),
    ]);
    const role = new ModelRole({
      name: 'pageGenerator',
      provider,
      model: 'model-a',
      systemPrompt: 'Write.',
      tools: createFilesystemTools(repo),
    });

    const result = await role.invoke('Document src/app.ts');

    expect(result.text).toBe('# App page');
    expect(result.usage.calls).toBe(2);
    const second = provider.seen[1].messages;
    expect(second).toHaveLength(3);
    expect(second[1]).toEqual({
      role: 'assistant',
      content: [
        { type: 'text', text: 'Let me look.' },
        { type: 'tool_use', id: 'call-1', name: 'read_file', input: { path: 'src/app.ts' } },
      ],
    });
    expect(second[2]).toEqual({
      role: 'user',
      content: [{ type: 'tool_result', tool_use_id: 'call-1', content: 'console.log("hi");\n' }],
    });
  });

  it('starts every invoke from a fresh conversation', async () => {
    const provider = new FakeProvider([response({ content: 'one' }), response({ content: 'two' })]);
    const role = new ModelRole({ name: 'critic', provider, model: 'm', systemPrompt: 's' });

    await role.invoke('first');
    await role.invoke('second');

    expect(provider.seen[1].messages).toEqual([{ role: 'user', content: 'second' }]);
  });

  it('stops after the tool turn budget', async () => {
    const toolTurn = () =>
      response({ stopReason: 'tool_use', toolCalls: [{ id: 'c', name: 'list_directory', arguments: { path: '.' } }] });
    const provider = new FakeProvider([toolTurn(), toolTurn(), toolTurn()]);
    const role = new ModelRole({
      name: 'gen',
      provider,
      model: 'm',
      systemPrompt: 's',
      tools: createFilesystemTools(repo),
      maxToolTurns: 2,
    });

    const result = await role.invoke('go');

    expect(provider.seen).toHaveLength(2);
    expect(result.text).toBe('');
  });

  it('raises a transient error when the provider reports one', async () => {
    const provider = new FakeProvider([response({ stopReason: 'error' })]);
    const role = new ModelRole({ name: 'gen', provider, model: 'm', systemPrompt: 's' });

    await expect(role.invoke('go')).rejects.toBeInstanceOf(TransientError);
  });

  it('propagates provider exceptions', async () => {
    const provider = new FakeProvider([]);
    const chat = vi.spyOn(provider, 'chat').mockRejectedValue(new Error('socket hang up'));
    const role = new ModelRole({ name: 'gen', provider, model: 'm', systemPrompt: 's' });

    await expect(role.invoke('go')).rejects.toThrow('socket hang up');
    expect(chat).toHaveBeenCalledTimes(1);
  });
});

describe('createFilesystemTools', () => {
  let repo: string;

  beforeEach(() => {
    repo = makeTempDir();
    writeFiles(repo, { 'src/app.ts': 'x', 'src/lib/util.ts': 'y', '.hidden': 'z' });
  });

  afterEach(() => {
    fs.rmSync(repo, { recursive: true, force: true });
  });

  it('lists a directory without dot entries', async () => {
    const tools = createFilesystemTools(repo);
    expect(await tools.execute('list_directory', { path: '.' })).toBe('[DIR] src');
    expect(await tools.execute('list_directory', { path: 'src' })).toBe('[DIR] lib\n[FILE] app.ts');
  });

  it('refuses paths outside the repository', async () => {
    const tools = createFilesystemTools(repo);
    expect(await tools.execute('read_file', { path: '../etc/passwd' })).toBe('Error: Path is outside the repository: ../etc/passwd');
  });

  it('reports reading a directory', async () => {
    const tools = createFilesystemTools(repo);
    expect(await tools.execute('read_file', { path: 'src' })).toBe('Error: Not a file: src');
  });

  it('reports unknown tools', async () => {
    const tools = createFilesystemTools(repo);
    expect(await tools.execute('delete_file', { path: 'src/app.ts' })).toBe('Error: Unknown tool: delete_file');
  });

  it('declares both tools', () => {
    expect(createFilesystemTools(repo).tools.map((t) => t.name)).toEqual(['read_file', 'list_directory']);
  });
});
