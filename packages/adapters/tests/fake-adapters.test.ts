import { describe, expect, it } from 'vitest';

import { FakeEffectsProcessor, FakeLogger, FakeSynthesisProvider, InMemoryWordBankStore } from '../src/index';
import { CancelledError, VOX_PCM_FORMAT } from '@vox/core';

describe('fake adapters', () => {
  it('produces deterministic clips sized by duration', async () => {
    const provider = new FakeSynthesisProvider({ durations: { hello: 0.25 } });

    const hello = await provider.synthesizeWord({ word: 'hello', voiceId: 'v1' });
    const world = await provider.synthesizeWord({ word: 'world', voiceId: 'v1' });

    expect(hello.audio.length).toBe(48_000);
    expect(hello.durationSeconds).toBe(0.25);
    expect(world.audio.length).toBe(96_000);
    expect(hello.audio.readInt16LE(0)).toBe(FakeSynthesisProvider.sampleFor('hello'));
    expect(hello.audio.readInt16LE(hello.audio.length - 2)).toBe(FakeSynthesisProvider.sampleFor('hello'));
    expect(provider.calls).toEqual([
      { word: 'hello', voiceId: 'v1' },
      { word: 'world', voiceId: 'v1' }
    ]);
  });

  it('throws configured failures and honours abort', async () => {
    const provider = new FakeSynthesisProvider({ failures: { broken: new Error('boom') }, delayMs: 50 });
    const controller = new AbortController();

    await expect(provider.synthesizeWord({ word: 'broken', voiceId: 'v1' })).rejects.toThrow('boom');

    const pending = provider.synthesizeWord({ word: 'slow', voiceId: 'v1', signal: controller.signal });
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(provider.inFlight).toBe(0);
  });

  it('keeps clips in memory by key', async () => {
    const store = new InMemoryWordBankStore();
    const key = { scopeId: 's1', voiceId: 'v1', word: 'hello' };
    const audio = Buffer.alloc(8, 1);

    await store.write({ key, audio, durationSeconds: 8 / 192_000, sizeBytes: 8, createdAt: new Date(0) });

    expect(await store.readAudio(key)).toEqual(audio);
    expect((await store.scan()).map((entry) => entry.key)).toEqual([key]);
    expect(await store.remove(key)).toBe(true);
    expect(await store.remove(key)).toBe(false);
    expect(store.writeCount).toBe(1);
  });

  it('records effect requests', async () => {
    const effects = new FakeEffectsProcessor();
    const settings = { highpassHz: 300, lowpassHz: 3400, compressionRatio: 2, distortion: 0.1 };

    const output = await effects.apply({ audio: Buffer.alloc(4), format: VOX_PCM_FORMAT, settings });

    expect(output.length).toBe(4);
    expect(effects.calls[0]?.settings).toEqual(settings);
  });

  it('merges child bindings into captured logs', () => {
    const logger = new FakeLogger();
    logger.child({ component: 'cache' }).info({ word: 'hello' }, 'Clip stored');

    expect(logger.find('Clip stored')).toEqual([
      { level: 'info', obj: { component: 'cache', word: 'hello' }, msg: 'Clip stored' }
    ]);
  });
});
