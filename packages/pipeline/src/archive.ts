import { z } from 'zod';
import { ArchiveError, isSameFormat, VOX_PCM_FORMAT, type WordClip } from '@vox/core';

const MAGIC = Buffer.from('VOXA', 'ascii');
export const ARCHIVE_VERSION = 1;
const HEADER_BYTES = MAGIC.length + 1 + 4;

const ArchiveEntrySchema = z.object({
  word: z.string(),
  voiceId: z.string(),
  sizeBytes: z.number().int().nonnegative(),
  durationSeconds: z.number().nonnegative(),
  createdAt: z.string().datetime(),
  offset: z.number().int().nonnegative()
});

const ArchiveManifestSchema = z.object({
  version: z.literal(ARCHIVE_VERSION),
  format: z.object({
    sampleRate: z.number().int().positive(),
    bitsPerSample: z.number().int().positive(),
    channels: z.number().int().positive()
  }),
  sourceScopeId: z.string(),
  exportedAt: z.string().datetime(),
  entries: z.array(ArchiveEntrySchema)
});

export type ArchiveEntry = z.infer<typeof ArchiveEntrySchema>;
export type ArchiveManifest = z.infer<typeof ArchiveManifestSchema>;

export interface DecodedArchiveEntry {
  entry: ArchiveEntry;
  audio: Buffer;
}

export interface DecodedArchive {
  manifest: ArchiveManifest;
  entries: DecodedArchiveEntry[];
}

/**
 * Layout: `VOXA`, version byte, u32 BE manifest length, UTF-8 JSON manifest,
 * then every clip's bytes in manifest order.
 */
export function encodeArchive(input: { sourceScopeId: string; clips: WordClip[]; exportedAt?: Date }): Buffer {
  let offset = 0;
  const entries: ArchiveEntry[] = input.clips.map((clip) => {
    const entry: ArchiveEntry = {
      word: clip.key.word,
      voiceId: clip.key.voiceId,
      sizeBytes: clip.audio.length,
      durationSeconds: clip.durationSeconds,
      createdAt: clip.createdAt.toISOString(),
      offset
    };
    offset += clip.audio.length;
    return entry;
  });

  const manifest: ArchiveManifest = {
    version: ARCHIVE_VERSION,
    format: { ...VOX_PCM_FORMAT },
    sourceScopeId: input.sourceScopeId,
    exportedAt: (input.exportedAt ?? new Date()).toISOString(),
    entries
  };

  const manifestBytes = Buffer.from(JSON.stringify(manifest), 'utf8');
  const header = Buffer.alloc(HEADER_BYTES);
  MAGIC.copy(header, 0);
  header.writeUInt8(ARCHIVE_VERSION, MAGIC.length);
  header.writeUInt32BE(manifestBytes.length, MAGIC.length + 1);

  return Buffer.concat([header, manifestBytes, ...input.clips.map((clip) => clip.audio)]);
}

/** Checks the whole archive before returning anything; structural problems throw ArchiveError. */
export function decodeArchive(archive: Buffer): DecodedArchive {
  if (archive.length < HEADER_BYTES || !archive.subarray(0, MAGIC.length).equals(MAGIC)) {
    throw new ArchiveError('Not a word bank archive: missing VOXA header');
  }

  const version = archive.readUInt8(MAGIC.length);
  if (version !== ARCHIVE_VERSION) {
    throw new ArchiveError(`Unsupported archive version ${version}`);
  }

  const manifestLength = archive.readUInt32BE(MAGIC.length + 1);
  const payloadStart = HEADER_BYTES + manifestLength;
  if (payloadStart > archive.length) {
    throw new ArchiveError('Archive manifest is truncated');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(archive.subarray(HEADER_BYTES, payloadStart).toString('utf8'));
  } catch {
    throw new ArchiveError('Archive manifest is not valid JSON');
  }

  const parsed = ArchiveManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
    throw new ArchiveError(`Invalid archive manifest: ${detail}`);
  }

  const manifest = parsed.data;
  if (!isSameFormat(manifest.format, VOX_PCM_FORMAT)) {
    const { sampleRate, bitsPerSample, channels } = manifest.format;
    throw new ArchiveError(`Archive audio format ${sampleRate} Hz/${bitsPerSample}-bit/${channels}ch does not match the word bank`);
  }

  const payload = archive.subarray(payloadStart);
  let expectedOffset = 0;
  for (const entry of manifest.entries) {
    if (entry.offset !== expectedOffset) {
      throw new ArchiveError(`Archive entry "${entry.word}" starts at ${entry.offset}, expected ${expectedOffset}`);
    }
    expectedOffset += entry.sizeBytes;
  }
  if (expectedOffset !== payload.length) {
    throw new ArchiveError(`Archive payload is ${payload.length} bytes but the manifest describes ${expectedOffset}`);
  }

  return {
    manifest,
    entries: manifest.entries.map((entry) => ({
      entry,
      audio: Buffer.from(payload.subarray(entry.offset, entry.offset + entry.sizeBytes))
    }))
  };
}
