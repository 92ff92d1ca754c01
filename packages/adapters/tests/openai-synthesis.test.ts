import { describe, expect, it, vi } from 'vitest';
import OpenAI from 'openai';
import { CancelledError, ProviderError } from '@vox/core';

import { OpenAISynthesisProvider } from '../src/index';

function pcm(samples: number[]): Buffer {
  const buffer = Buffer.alloc(samples.length * 2);
  samples.forEach((sample, index) => buffer.writeInt16LE(sample, index * 2));
  return buffer;
}

function samplesOf(buffer: Buffer): number[] {
  const out: number[] = [];
  for (let offset = 0; offset < buffer.length; offset += 2) {
    out.push(buffer.readInt16LE(offset));
  }
  return out;
}

function providerWith(create: (...args: unknown[]) => Promise<unknown>): OpenAISynthesisProvider {
  return new OpenAISynthesisProvider({
    apiKey: 'sk-test',
    model: 'gpt-4o-mini-tts',
    client: {
      audio: { speech: { create } }
    } as unknown as OpenAI
  });
}

describe('openai synthesis provider', () => {
  it('requests raw pcm and converts it to 48 kHz stereo', async () => {
    const raw = pcm([100, 200, 300, 400]);
    const create = vi.fn(async (_input: unknown, _options: unknown) => ({
      arrayBuffer: async () => raw.buffer.slice(raw.byteOffset, raw.byteOffset + raw.byteLength)
    }));
    const provider = providerWith(create);
    const controller = new AbortController();

    const result = await provider.synthesizeWord({ word: 'alpha', voiceId: 'onyx', signal: controller.signal });

    expect(create).toHaveBeenCalledTimes(1);
    expect(create.mock.calls[0]?.[0]).toEqual({
      model: 'gpt-4o-mini-tts',
      voice: 'onyx',
      input: 'alpha',
      response_format: 'pcm'
    });
    expect(create.mock.calls[0]?.[1]).toEqual({ signal: controller.signal });
    expect(samplesOf(result.audio)).toEqual([
      100, 100, 150, 150, 200, 200, 250, 250,
      300, 300, 350, 350, 400, 400, 400, 400
    ]);
    expect(result.durationSeconds).toBe(32 / 192_000);
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it('marks connection failures as retryable provider errors', async () => {
    const provider = providerWith(vi.fn(async () => {
      throw new OpenAI.APIConnectionError({ message: 'socket hang up' });
    }));

    const error = await provider.synthesizeWord({ word: 'bravo', voiceId: 'onyx' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ code: 'provider', word: 'bravo', retryable: true });
  });

  it('does not retry plain failures', async () => {
    const provider = providerWith(vi.fn(async () => {
      throw new Error('bad voice');
    }));

    const error = await provider.synthesizeWord({ word: 'bravo', voiceId: 'nobody' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      retryable: false,
      message: 'OpenAI speech synthesis failed for "bravo": bad voice'
    });
  });

  it('maps aborted requests to cancellation', async () => {
    const provider = providerWith(vi.fn(async () => {
      throw new OpenAI.APIUserAbortError();
    }));

    await expect(provider.synthesizeWord({ word: 'charlie', voiceId: 'onyx' })).rejects.toBeInstanceOf(CancelledError);
  });

  it('rejects empty audio', async () => {
    const provider = providerWith(vi.fn(async () => ({ arrayBuffer: async () => new ArrayBuffer(0) })));

    await expect(provider.synthesizeWord({ word: 'delta', voiceId: 'onyx' })).rejects.toMatchObject({
      code: 'provider',
      message: 'OpenAI returned no audio for "delta"'
    });
  });
});
