/**
 * Tests for configuration, errors and logging
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigManager, modelForRole, resolveSettings } from '../src/config.js';
import { PermanentError, TimeoutError, TransientError, withTimeout, errorMessage } from '../src/errors.js';
import { createLogger } from '../src/logger.js';
import { makeTempDir } from './helpers.js';

describe('resolveSettings', () => {
  it('fills in defaults', () => {
    const settings = resolveSettings({});
    expect(settings.qualityThreshold).toBe(7.0);
    expect(settings.maxAgentAttempts).toBe(3);
    expect(settings.chunkMaxTokens).toBe(512);
    expect(settings.chunkOverlapTokens).toBe(50);
    expect(settings.chunkMinTokens).toBe(50);
    expect(settings.provider).toBe('anthropic');
  });

  it('coerces numeric strings from the environment', () => {
    expect(resolveSettings({ qualityThreshold: '8.5', maxAgentAttempts: '5' }).maxAgentAttempts).toBe(5);
  });

  it('rejects out-of-range values with the offending path', () => {
    expect(() => resolveSettings({ qualityThreshold: 11 })).toThrow(PermanentError);
    expect(() => resolveSettings({ maxAgentAttempts: 0 })).toThrow(/maxAgentAttempts/);
  });

  it('falls back to the default model for unconfigured roles', () => {
    const settings = resolveSettings({ defaultModel: 'base-model', agentModels: { pageCritic: 'critic-model' } });
    expect(modelForRole(settings, 'pageCritic')).toBe('critic-model');
    expect(modelForRole(settings, 'pageGenerator')).toBe('base-model');
  });
});

describe('ConfigManager', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('layers file, environment and overrides', async () => {
    fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify({ qualityThreshold: 6, defaultModel: 'file-model' }));
    const manager = new ConfigManager({ configDir: dir, env: { WIKIFORGE_MODEL: 'env-model', ANTHROPIC_API_KEY: 'test-secret' } });
    await manager.load();

    const settings = manager.resolve({ maxAgentAttempts: 4, verbose: undefined }, '/work');

    expect(settings.qualityThreshold).toBe(6);
    expect(settings.defaultModel).toBe('env-model');
    expect(settings.maxAgentAttempts).toBe(4);
    expect(settings.apiKey).toBe('test-secret');
    expect(settings.storePath).toBe(path.resolve('/work', '.wikiforge', 'store.json'));
    expect(manager.hasApiKey()).toBe(true);
  });

  it('saves and reloads values', async () => {
    const manager = new ConfigManager({ configDir: dir, env: {} });
    await manager.load();
    await manager.save({ defaultModel: 'saved-model' });

    const reloaded = new ConfigManager({ configDir: dir, env: {} });
    expect((await reloaded.load()).defaultModel).toBe('saved-model');
    expect(reloaded.getApiKey()).toBeUndefined();
  });

  it('keeps stored keys when saving undefined values', async () => {
    const first = new ConfigManager({ configDir: dir, env: {} });
    await first.load();
    await first.save({ apiKey: 'test-secret' });

    const second = new ConfigManager({ configDir: dir, env: {} });
    await second.load();
    await second.save({ apiKey: undefined, defaultModel: 'other-model' });

    const stored = JSON.parse(fs.readFileSync(path.join(dir, 'config.json'), 'utf-8'));
    expect(stored).toEqual({ apiKey: 'test-secret', defaultModel: 'other-model' });
  });

  it('never writes the environment key to the config file', async () => {
    const manager = new ConfigManager({ configDir: dir, env: { ANTHROPIC_API_KEY: 'env-secret' } });
    await manager.load();
    await manager.save({ defaultModel: 'saved-model' });

    const stored = JSON.parse(fs.readFileSync(path.join(dir, 'config.json'), 'utf-8'));
    expect(stored).toEqual({ defaultModel: 'saved-model' });
    expect(manager.getApiKey()).toBe('env-secret');
  });

  it('ignores an unreadable config file', async () => {
    fs.writeFileSync(path.join(dir, 'config.json'), '{ not json');
    const manager = new ConfigManager({ configDir: dir, env: {} });
    expect(await manager.load()).toEqual({});
  });
});

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('passes the result through when the work finishes first', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 1000, 'work')).resolves.toBe('ok');
  });

  it('rejects with a TimeoutError when the timer fires first', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<string>(() => {}), 50, 'Page generation');
    const assertion = expect(pending).rejects.toThrow('Page generation timed out after 50ms');
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it('classifies timeouts as transient', () => {
    const error = new TimeoutError('x', 10);
    expect(error).toBeInstanceOf(TransientError);
    expect(error.code).toBe('TIMEOUT');
    expect(error.name).toBe('TimeoutError');
  });

  it('does not time out with a non-positive limit', async () => {
    await expect(withTimeout(Promise.resolve(1), 0, 'work')).resolves.toBe(1);
  });
});

describe('errorMessage', () => {
  it('reads messages from errors and stringifies anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('createLogger', () => {
  it('prefixes level and scope and hides debug unless verbose', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    try {
      const logger = createLogger('jobs').child('scope');
      logger.debug('hidden');
      logger.warn('careful');
      createLogger('jobs', { verbose: true }).debug('shown');
      createLogger('jobs', { silent: true }).error('never');

      expect(write.mock.calls.map(([line]) => line)).toEqual(['[WARN] [jobs:scope] careful\n', '[DEBUG] [jobs] shown\n']);
    } finally {
      write.mockRestore();
    }
  });
});
