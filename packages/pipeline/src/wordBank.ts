import {
  type CacheKey,
  cacheKeyId,
  durationFromBytes,
  isFrameAligned,
  type Logger,
  type RuntimeResource,
  ValidationError,
  VOX_DEFAULTS,
  type WordBankStats,
  type WordBankStore,
  type WordClip,
  type WordClipMetadata
} from '@vox/core';

import { decodeArchive, encodeArchive } from './archive';
import { validateWord } from './tokenizer';

export interface WordBankCacheOptions {
  store: WordBankStore;
  logger: Logger;
  maxWordLength?: number;
}

export interface ImportOptions {
  /** Replace clips that already exist. Defaults to true. */
  overwrite?: boolean;
}

export interface ImportSkip {
  word: string;
  voiceId: string;
  reason: string;
}

export interface ImportReport {
  imported: number;
  /** Existing clips left in place because `overwrite` was false. */
  kept: number;
  skipped: ImportSkip[];
}

const DEFAULT_SEARCH_LIMIT = 25;
const RESERVED_KEY_PARTS = new Set(['.', '..']);

function byWord(a: WordClipMetadata, b: WordClipMetadata): number {
  return a.key.word.localeCompare(b.key.word) || a.key.voiceId.localeCompare(b.key.voiceId);
}

/**
 * Keyed clip store with an in-memory metadata index over a WordBankStore.
 * The index is loaded on `start()`, or on first use.
 */
export class WordBankCache implements RuntimeResource {
  private readonly store: WordBankStore;
  private readonly logger: Logger;
  private readonly maxWordLength: number;
  private readonly index = new Map<string, WordClipMetadata>();
  private loading: Promise<void> | null = null;
  /** Tail of the write chain per key; same-key writes run one after another. */
  private readonly writeChains = new Map<string, Promise<unknown>>();

  public constructor(options: WordBankCacheOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.maxWordLength = options.maxWordLength ?? VOX_DEFAULTS.MAX_WORD_LENGTH;
  }

  public async start(): Promise<void> {
    await this.store.start?.();
    await this.ensureIndex();
  }

  public async close(): Promise<void> {
    await this.store.close?.();
  }

  public async get(key: CacheKey): Promise<WordClip | null> {
    await this.ensureIndex();
    const id = cacheKeyId(key);
    const metadata = this.index.get(id);
    if (!metadata) {
      return null;
    }

    const audio = await this.store.readAudio(key);
    if (!audio) {
      this.logger.warn({ key }, 'Indexed clip has no audio; dropping it from the index');
      this.index.delete(id);
      return null;
    }

    return { ...metadata, key: { ...metadata.key }, audio };
  }

  public async has(key: CacheKey): Promise<boolean> {
    await this.ensureIndex();
    return this.index.has(cacheKeyId(key));
  }

  public async getMetadata(key: CacheKey): Promise<WordClipMetadata | null> {
    await this.ensureIndex();
    return this.index.get(cacheKeyId(key)) ?? null;
  }

  public async put(
    key: CacheKey,
    audio: Buffer,
    durationSeconds?: number,
    createdAt: Date = new Date()
  ): Promise<WordClip> {
    this.assertKey(key);
    if (audio.length === 0 || !isFrameAligned(audio.length)) {
      throw new ValidationError(`Clip for "${key.word}" must be non-empty, frame-aligned PCM`, [
        { path: 'audio', message: `${audio.length} bytes is not a whole number of 4-byte frames` }
      ]);
    }
    await this.ensureIndex();

    const clip: WordClip = {
      key: { ...key },
      audio,
      durationSeconds: durationSeconds ?? durationFromBytes(audio.length),
      sizeBytes: audio.length,
      createdAt
    };

    const id = cacheKeyId(key);
    await this.serialize(id, async () => {
      await this.store.write(clip);
      this.index.set(id, {
        key: clip.key,
        durationSeconds: clip.durationSeconds,
        sizeBytes: clip.sizeBytes,
        createdAt: clip.createdAt
      });
    });

    this.logger.debug({ key, sizeBytes: clip.sizeBytes }, 'Clip stored');
    return clip;
  }

  public async delete(key: CacheKey): Promise<boolean> {
    await this.ensureIndex();
    const id = cacheKeyId(key);
    const removed = await this.serialize(id, async () => {
      const existed = await this.store.remove(key);
      return this.index.delete(id) || existed;
    });
    return removed;
  }

  /** Removes one voice's clips, or every clip of the scope when `voiceId` is omitted. */
  public async purge(scopeId: string, voiceId?: string): Promise<number> {
    const targets = await this.list(scopeId, voiceId);
    let count = 0;
    for (const metadata of targets) {
      if (await this.delete(metadata.key)) {
        count += 1;
      }
    }

    this.logger.info({ scopeId, voiceId, count }, 'Word bank purged');
    return count;
  }

  public async list(scopeId: string, voiceId?: string): Promise<WordClipMetadata[]> {
    await this.ensureIndex();
    return [...this.index.values()]
      .filter((entry) => entry.key.scopeId === scopeId && (voiceId === undefined || entry.key.voiceId === voiceId))
      .sort(byWord);
  }

  /** Prefix matches first, then substring matches, each sorted by word. */
  public async search(scopeId: string, voiceId: string, query: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<WordClipMetadata[]> {
    const entries = await this.list(scopeId, voiceId);
    const needle = query.trim().toLowerCase();
    if (!needle) {
      return entries.slice(0, limit);
    }

    const prefix = entries.filter((entry) => entry.key.word.startsWith(needle));
    const contains = entries.filter((entry) => !entry.key.word.startsWith(needle) && entry.key.word.includes(needle));
    return [...prefix, ...contains].slice(0, limit);
  }

  public async stats(scopeId: string): Promise<WordBankStats> {
    const entries = await this.list(scopeId);
    return {
      totalWords: entries.length,
      totalBytes: entries.reduce((sum, entry) => sum + entry.sizeBytes, 0),
      voicesUsed: [...new Set(entries.map((entry) => entry.key.voiceId))].sort()
    };
  }

  public async export(scopeId: string, voiceId?: string): Promise<Buffer> {
    const clips: WordClip[] = [];
    for (const metadata of await this.list(scopeId, voiceId)) {
      const clip = await this.get(metadata.key);
      if (clip) {
        clips.push(clip);
      }
    }

    this.logger.info({ scopeId, voiceId, clips: clips.length }, 'Word bank exported');
    return encodeArchive({ sourceScopeId: scopeId, clips });
  }

  /** Imports an archive into `scopeId`. The archive is fully validated before any clip is written. */
  public async import(scopeId: string, archive: Buffer, options: ImportOptions = {}): Promise<ImportReport> {
    const overwrite = options.overwrite ?? true;
    const decoded = decodeArchive(archive);
    const report: ImportReport = { imported: 0, kept: 0, skipped: [] };

    const accepted = decoded.entries.filter(({ entry, audio }) => {
      const reason = this.importProblem(entry.word, entry.voiceId, audio);
      if (reason) {
        report.skipped.push({ word: entry.word, voiceId: entry.voiceId, reason });
        return false;
      }
      return true;
    });

    for (const { entry, audio } of accepted) {
      const key: CacheKey = { scopeId, voiceId: entry.voiceId, word: entry.word };
      if (!overwrite && await this.has(key)) {
        report.kept += 1;
        continue;
      }
      await this.put(key, audio, entry.durationSeconds, new Date(entry.createdAt));
      report.imported += 1;
    }

    this.logger.info(
      { scopeId, sourceScopeId: decoded.manifest.sourceScopeId, imported: report.imported, kept: report.kept, skipped: report.skipped.length },
      'Word bank imported'
    );
    return report;
  }

  private importProblem(word: string, voiceId: string, audio: Buffer): string | null {
    const wordProblem = validateWord(word, this.maxWordLength);
    if (wordProblem) return wordProblem;
    if (!voiceId.trim()) return 'missing_voice';
    if (audio.length === 0 || !isFrameAligned(audio.length)) return 'misaligned_audio';
    return null;
  }

  private assertKey(key: CacheKey): void {
    const issues = (['scopeId', 'voiceId', 'word'] as const).flatMap((field) => {
      const value = key[field];
      if (!value.trim()) return [{ path: field, message: 'must not be empty' }];
      if (RESERVED_KEY_PARTS.has(value)) return [{ path: field, message: `"${value}" is not a valid key part` }];
      return [];
    });
    if (issues.length > 0) {
      throw new ValidationError('Invalid cache key', issues);
    }
  }

  private async serialize<T>(id: string, task: () => Promise<T>): Promise<T> {
    const previous = this.writeChains.get(id) ?? Promise.resolve();
    const next = previous.then(task, task);
    const tail = next.catch(() => undefined);
    this.writeChains.set(id, tail);

    try {
      return await next;
    } finally {
      if (this.writeChains.get(id) === tail) {
        this.writeChains.delete(id);
      }
    }
  }

  private ensureIndex(): Promise<void> {
    if (!this.loading) {
      this.loading = this.loadIndex().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }

  private async loadIndex(): Promise<void> {
    const entries = await this.store.scan();
    for (const entry of entries) {
      this.index.set(cacheKeyId(entry.key), entry);
    }
    this.logger.debug({ clips: entries.length }, 'Word bank index loaded');
  }
}
