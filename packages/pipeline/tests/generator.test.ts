import { describe, expect, it, vi } from "vitest";
import {
  CancelledError,
  type GenerationProgress,
  ProviderError,
  type SynthesisProvider,
} from "@vox/core";
import {
  FakeLogger,
  FakeSynthesisProvider,
  InMemoryWordBankStore,
  TEST_SCOPE_ID,
  TEST_VOICE_ID,
  makeClip,
  seedWordBank,
  word,
} from "@vox/testing";
import { ConcurrentGenerator, WordBankCache, uniqueWords } from "../src/index";

function setup(provider: SynthesisProvider, options: { concurrency?: number; providerTimeoutMs?: number; maxRetries?: number } = {}) {
  const store = new InMemoryWordBankStore();
  const logger = new FakeLogger();
  const cache = new WordBankCache({ store, logger });
  const generator = new ConcurrentGenerator({
    cache,
    provider,
    logger,
    concurrency: options.concurrency ?? 3,
    providerTimeoutMs: options.providerTimeoutMs ?? 1_000,
    maxRetries: options.maxRetries ?? 1,
    retryBaseDelayMs: 0,
    retryJitterMs: 0,
  });
  return { store, logger, cache, generator };
}

function tokens(...words: string[]) {
  return words.map((value, index) => word(value, index));
}

describe("ConcurrentGenerator", () => {
  it("keeps unique words in first-appearance order", () => {
    expect(uniqueWords(tokens("charlie", "alpha", "charlie", "bravo"))).toEqual(["charlie", "alpha", "bravo"]);
  });

  it("returns cached clips without calling the provider", async () => {
    const provider = new FakeSynthesisProvider();
    const { cache, generator } = setup(provider);
    await seedWordBank(cache, { alpha: 0.5 });

    const results = await generator.generateMissing(tokens("alpha", "bravo"), TEST_VOICE_ID, TEST_SCOPE_ID);

    expect(results.get("alpha")?.status).toBe("cached");
    expect(results.get("bravo")?.status).toBe("generated");
    expect(provider.calls).toEqual([{ word: "bravo", voiceId: TEST_VOICE_ID }]);
    expect(await cache.has({ scopeId: TEST_SCOPE_ID, voiceId: TEST_VOICE_ID, word: "bravo" })).toBe(true);
  });

  it("bounds the number of provider calls in flight", async () => {
    const provider = new FakeSynthesisProvider({ delayMs: 20 });
    const { store, generator } = setup(provider, { concurrency: 2 });

    const results = await generator.generateMissing(
      tokens("one", "two", "three", "four", "five", "six"),
      TEST_VOICE_ID,
      TEST_SCOPE_ID,
    );

    expect(provider.maxInFlight).toBe(2);
    expect([...results.values()].every((result) => result.status === "generated")).toBe(true);
    expect(store.writeCount).toBe(6);
  });

  it("reports a failed word without failing its siblings", async () => {
    const provider = new FakeSynthesisProvider({ failures: { delta: new Error("voice unavailable") } });
    const { generator } = setup(provider);
    const events: GenerationProgress[] = [];

    const results = await generator.generateMissing(
      tokens("alpha", "bravo", "charlie", "delta", "echo"),
      TEST_VOICE_ID,
      TEST_SCOPE_ID,
      { onProgress: (progress) => events.push(progress) },
    );

    expect([...results.keys()]).toEqual(["alpha", "bravo", "charlie", "delta", "echo"]);
    expect(results.get("delta")).toEqual({ status: "failed", reason: "voice unavailable" });
    expect(provider.callsFor("delta")).toBe(1);
    expect(events.at(-1)).toMatchObject({ total: 5, cached: 0, generated: 4, failed: 1, skipped: 0, inFlight: 0 });
  });

  it("retries transient provider errors", async () => {
    const audio = makeClip("foxtrot", 0.1).audio;
    const synthesizeWord = vi.fn()
      .mockRejectedValueOnce(new ProviderError({ word: "foxtrot", message: "busy", retryable: true }))
      .mockResolvedValueOnce({ audio, latencyMs: 1 });
    const { generator } = setup({ synthesizeWord });

    const results = await generator.generateMissing(tokens("foxtrot"), TEST_VOICE_ID, TEST_SCOPE_ID);

    expect(synthesizeWord).toHaveBeenCalledTimes(2);
    expect(results.get("foxtrot")?.status).toBe("generated");
  });

  it("fails words whose provider call times out", async () => {
    const provider = new FakeSynthesisProvider({ delayMs: 200 });
    const { generator } = setup(provider, { providerTimeoutMs: 10, maxRetries: 0 });

    const results = await generator.generateMissing(tokens("slow"), TEST_VOICE_ID, TEST_SCOPE_ID);

    expect(results.get("slow")).toEqual({ status: "failed", reason: 'Synthesis of "slow" timed out after 10ms' });
  });

  it("rejects audio that is not frame aligned", async () => {
    const synthesizeWord = vi.fn(async () => ({ audio: Buffer.alloc(6), latencyMs: 1 }));
    const { store, generator } = setup({ synthesizeWord });

    const results = await generator.generateMissing(tokens("odd"), TEST_VOICE_ID, TEST_SCOPE_ID);

    expect(results.get("odd")).toEqual({ status: "failed", reason: "invalid_audio: 6 bytes is not whole 4-byte frames" });
    expect(store.writeCount).toBe(0);
  });

  it("skips misses in cache-only mode", async () => {
    const provider = new FakeSynthesisProvider();
    const { cache, generator } = setup(provider);
    await seedWordBank(cache, { alpha: 0.5 });

    const results = await generator.generateMissing(tokens("alpha", "bravo"), TEST_VOICE_ID, TEST_SCOPE_ID, {
      generateMissing: false,
    });

    expect(results.get("alpha")?.status).toBe("cached");
    expect(results.get("bravo")).toEqual({ status: "skipped", reason: "not_cached" });
    expect(provider.calls).toEqual([]);
  });

  it("shares one provider call between overlapping requests for the same word", async () => {
    const provider = new FakeSynthesisProvider({ delayMs: 20 });
    const { generator } = setup(provider);

    const [first, second] = await Promise.all([
      generator.generateMissing(tokens("zulu"), TEST_VOICE_ID, TEST_SCOPE_ID),
      generator.generateMissing(tokens("zulu"), TEST_VOICE_ID, TEST_SCOPE_ID),
    ]);

    expect(provider.callsFor("zulu")).toBe(1);
    expect(first.get("zulu")?.status).toBe("generated");
    expect(second.get("zulu")?.status).toBe("cached");
  });

  it("lets a request sharing another's generation cancel without waiting for it", async () => {
    const provider = new FakeSynthesisProvider({ delayMs: 600 });
    const { cache, generator } = setup(provider);
    const controller = new AbortController();

    const owner = generator.generateMissing(tokens("zulu"), TEST_VOICE_ID, TEST_SCOPE_ID);
    const joiner = generator.generateMissing(tokens("zulu"), TEST_VOICE_ID, TEST_SCOPE_ID, {
      signal: controller.signal,
    });
    const startedAt = Date.now();
    setTimeout(() => controller.abort(), 10);

    await expect(joiner).rejects.toBeInstanceOf(CancelledError);
    expect(Date.now() - startedAt).toBeLessThan(300);

    const results = await owner;
    expect(results.get("zulu")?.status).toBe("generated");
    expect(provider.callsFor("zulu")).toBe(1);
    expect(await cache.has({ scopeId: TEST_SCOPE_ID, voiceId: TEST_VOICE_ID, word: "zulu" })).toBe(true);
  });

  it("stops queued work on cancellation", async () => {
    const provider = new FakeSynthesisProvider({ delayMs: 50 });
    const { store, generator } = setup(provider, { concurrency: 1 });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    await expect(
      generator.generateMissing(tokens("alpha", "bravo", "charlie"), TEST_VOICE_ID, TEST_SCOPE_ID, {
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(CancelledError);

    expect(provider.calls).toHaveLength(1);
    expect(store.writeCount).toBe(0);
  });
});
