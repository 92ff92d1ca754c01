import { describe, expect, it } from 'vitest';

import { loadVoxConfig, resolveVoxConfig, ValidationError, VOX_DEFAULTS } from '../src';

describe('vox config resolution', () => {
  it('fills every default', () => {
    const config = resolveVoxConfig({ prettyLogs: false });

    expect(config.cacheDir).toBe(VOX_DEFAULTS.CACHE_DIR);
    expect(config.concurrency).toBe(3);
    expect(config.wordGapMs).toBe(50);
    expect(config.pauseMode).toBe('additive');
    expect(config.maxMessageLength).toBe(500);
    expect(config.maxMessageWords).toBe(50);
    expect(config.maxWordLength).toBe(30);
    expect(config.providerTimeoutMs).toBe(15_000);
    expect(config.maxRetries).toBe(1);
    expect(config.retryBaseDelayMs).toBe(75);
    expect(config.retryJitterMs).toBe(25);
    expect(config.contractions).toBe('join');
    expect(config.expandNumbers).toBe(false);
    expect(config.logLevel).toBe('info');
  });

  it('keeps explicit overrides', () => {
    const config = resolveVoxConfig({ concurrency: 8, pauseMode: 'override', cacheDir: '/tmp/vox' });

    expect(config.concurrency).toBe(8);
    expect(config.pauseMode).toBe('override');
    expect(config.cacheDir).toBe('/tmp/vox');
  });

  it('rejects a word gap outside 20..200 ms', () => {
    expect(() => resolveVoxConfig({ wordGapMs: 10 })).toThrow(ValidationError);
    expect(() => resolveVoxConfig({ wordGapMs: 250 })).toThrow(/wordGapMs/);
  });

  it('reads VOX_* environment variables', () => {
    const config = loadVoxConfig({
      VOX_CACHE_DIR: '/var/lib/vox',
      VOX_CONCURRENCY: '5',
      VOX_WORD_GAP_MS: '80',
      VOX_PAUSE_MODE: 'override',
      VOX_EXPAND_NUMBERS: 'true',
      VOX_LOG_LEVEL: 'debug',
      VOX_PRETTY_LOGS: '0'
    });

    expect(config.cacheDir).toBe('/var/lib/vox');
    expect(config.concurrency).toBe(5);
    expect(config.wordGapMs).toBe(80);
    expect(config.pauseMode).toBe('override');
    expect(config.expandNumbers).toBe(true);
    expect(config.logLevel).toBe('debug');
    expect(config.prettyLogs).toBe(false);
  });

  it('reports invalid environment values with their variable name', () => {
    try {
      loadVoxConfig({ VOX_PAUSE_MODE: 'sometimes' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect((error as ValidationError).issues[0]?.path).toBe('VOX_PAUSE_MODE');
    }
  });
});
