import {
  FakeEffectsProcessor,
  FakeLogger,
  FakeSynthesisProvider,
  type FakeSynthesisProviderOptions,
  InMemoryWordBankStore,
} from "@vox/adapters";
import {
  type CacheKey,
  durationFromBytes,
  type Token,
  type VoxConfig,
  type WordClip,
} from "@vox/core";
import { createVoxEngine, type VoxEngine, type WordBankCache } from "@vox/pipeline";

export {
  FakeEffectsProcessor,
  FakeLogger,
  FakeSynthesisProvider,
  InMemoryWordBankStore,
};

export const TEST_SCOPE_ID = "guild-1";
export const TEST_VOICE_ID = "onyx";

export function testKey(word: string, overrides?: Partial<CacheKey>): CacheKey {
  return { scopeId: TEST_SCOPE_ID, voiceId: TEST_VOICE_ID, word, ...overrides };
}

/** PCM in the system format where every sample holds `sample`. */
export function constantPcm(sample: number, durationSeconds: number): Buffer {
  const audio = Buffer.alloc(Math.floor(durationSeconds * 48_000) * 4);
  for (let offset = 0; offset < audio.length; offset += 2) {
    audio.writeInt16LE(sample, offset);
  }
  return audio;
}

export function makeClip(word: string, durationSeconds = 0.5, key?: Partial<CacheKey>): WordClip {
  const audio = FakeSynthesisProvider.clipFor(word, durationSeconds);
  return {
    key: testKey(word, key),
    audio,
    durationSeconds: durationFromBytes(audio.length),
    sizeBytes: audio.length,
    createdAt: new Date("2026-01-01T00:00:00Z"),
  };
}

export function word(value: string, position: number): Token {
  return { word: value, kind: "word", pauseDurationMs: 0, position };
}

export function pause(durationMs: number, position: number, mark = "period"): Token {
  return { word: mark, kind: "pause", pauseDurationMs: durationMs, position };
}

/** Writes fake clips for `words` (word -> seconds) through the cache. */
export async function seedWordBank(
  cache: WordBankCache,
  words: Record<string, number>,
  key?: Partial<CacheKey>,
): Promise<WordClip[]> {
  const clips: WordClip[] = [];
  for (const [value, seconds] of Object.entries(words)) {
    const clip = makeClip(value, seconds, key);
    clips.push(await cache.put(clip.key, clip.audio, clip.durationSeconds));
  }
  return clips;
}

export interface FakeVoxDeps {
  store: InMemoryWordBankStore;
  provider: FakeSynthesisProvider;
  effects: FakeEffectsProcessor;
  logger: FakeLogger;
}

export function createFakeVoxDeps(providerOptions?: FakeSynthesisProviderOptions): FakeVoxDeps {
  return {
    store: new InMemoryWordBankStore(),
    provider: new FakeSynthesisProvider(providerOptions),
    effects: new FakeEffectsProcessor(),
    logger: new FakeLogger(),
  };
}

/** Retries run without backoff so failure paths stay fast. */
export function createFakeVoxConfig(overrides?: Partial<VoxConfig>): Partial<VoxConfig> {
  return {
    cacheDir: "/tmp/vox-test",
    retryBaseDelayMs: 0,
    retryJitterMs: 0,
    prettyLogs: false,
    ...overrides,
  };
}

export function createTestEngine(options?: {
  config?: Partial<VoxConfig>;
  deps?: FakeVoxDeps;
}): { engine: VoxEngine; deps: FakeVoxDeps } {
  const deps = options?.deps ?? createFakeVoxDeps();
  const engine = createVoxEngine({
    store: deps.store,
    provider: deps.provider,
    effects: deps.effects,
    logger: deps.logger,
    config: createFakeVoxConfig(options?.config),
  });
  return { engine, deps };
}
