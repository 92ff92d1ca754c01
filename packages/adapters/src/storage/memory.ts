import {
    type CacheKey,
    cacheKeyId,
    toMetadata,
    type WordBankStore,
    type WordClip,
    type WordClipMetadata
} from '@vox/core';

export class InMemoryWordBankStore implements WordBankStore {
    private readonly clips = new Map<string, WordClip>();
    public writeCount = 0;

    public async start(): Promise<void> { }
    public async close(): Promise<void> { }

    public async scan(): Promise<WordClipMetadata[]> {
        return [...this.clips.values()].map(toMetadata);
    }

    public async readAudio(key: CacheKey): Promise<Buffer | null> {
        return this.clips.get(cacheKeyId(key))?.audio ?? null;
    }

    public async write(clip: WordClip): Promise<void> {
        this.writeCount += 1;
        this.clips.set(cacheKeyId(clip.key), { ...clip, key: { ...clip.key }, sizeBytes: clip.audio.length });
    }

    public async remove(key: CacheKey): Promise<boolean> {
        return this.clips.delete(cacheKeyId(key));
    }
}
