/** Identifies one clip: a word spoken by a voice inside a tenant scope. */
export interface CacheKey {
  scopeId: string;
  word   : string;
  voiceId: string;
}

export interface WordClipMetadata {
  key            : CacheKey;
  durationSeconds: number;
  sizeBytes      : number;
  createdAt      : Date;
}

export interface WordClip extends WordClipMetadata {
  /** PCM in the system format. Treat as read-only. */
  audio: Buffer;
}

export interface WordBankStats {
  totalWords: number;
  totalBytes: number;
  voicesUsed: string[];
}

/**
 * Stable string form of a key, used for in-memory indexes. Components are
 * URI-encoded so separators inside ids cannot collide.
 */
export function cacheKeyId(key: CacheKey): string {
  return [key.scopeId, key.voiceId, key.word].map(encodeURIComponent).join('/');
}

export function sameKey(a: CacheKey, b: CacheKey): boolean {
  return a.scopeId === b.scopeId && a.voiceId === b.voiceId && a.word === b.word;
}

export function toMetadata(clip: WordClip): WordClipMetadata {
  return {
    key            : { ...clip.key },
    durationSeconds: clip.durationSeconds,
    sizeBytes      : clip.sizeBytes,
    createdAt      : clip.createdAt
  };
}
