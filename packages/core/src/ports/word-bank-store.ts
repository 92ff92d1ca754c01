import { type RuntimeResource } from '../lifecycle';
import type { CacheKey, WordClip, WordClipMetadata } from '../entities/clip';

/**
 * Durable byte storage for clips. Metadata is kept apart from audio so the
 * full inventory can be listed without reading payloads.
 */
export interface WordBankStore extends RuntimeResource {
  /** Every clip's metadata, across all scopes. */
  scan(): Promise<WordClipMetadata[]>;
  readAudio(key: CacheKey): Promise<Buffer | null>;
  /** Atomically replaces any clip stored under the same key. */
  write(clip: WordClip): Promise<void>;
  remove(key: CacheKey): Promise<boolean>;
}
