import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import {
    type CacheKey,
    errorMessage,
    type Logger,
    type WordBankStore,
    type WordClip,
    type WordClipMetadata
} from '@vox/core';

const SidecarSchema = z.object({
    scopeId: z.string().min(1),
    voiceId: z.string().min(1),
    word: z.string().min(1),
    durationSeconds: z.number().nonnegative(),
    sizeBytes: z.number().int().nonnegative(),
    createdAt: z.string().datetime()
});

type Sidecar = z.infer<typeof SidecarSchema>;

export interface FileSystemWordBankStoreOptions {
    rootDir: string;
    logger?: Logger;
}

/** URI-encodes a key part, dots included, so no segment can read as `.` or `..`. */
function pathSegment(value: string): string {
    return encodeURIComponent(value).replace(/\./g, '%2E');
}

function isMissing(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stores clips as `{root}/{scope}/{voice}/{word}.pcm` with a `{word}.json`
 * sidecar. Path segments are URI-encoded with dots escaped; the sidecar
 * holds the raw key.
 */
export class FileSystemWordBankStore implements WordBankStore {
    private readonly rootDir: string;
    private readonly logger: Logger | undefined;

    public constructor(options: FileSystemWordBankStoreOptions) {
        this.rootDir = path.resolve(options.rootDir);
        this.logger = options.logger;
    }

    public async start(): Promise<void> {
        await mkdir(this.rootDir, { recursive: true });
    }

    public async scan(): Promise<WordClipMetadata[]> {
        const results: WordClipMetadata[] = [];

        for (const scopeDir of await this.listDirs(this.rootDir)) {
            for (const voiceDir of await this.listDirs(scopeDir)) {
                const entries = await readdir(voiceDir, { withFileTypes: true });
                for (const entry of entries) {
                    if (!entry.isFile() || !entry.name.endsWith('.json')) {
                        continue;
                    }
                    const metadata = await this.readSidecar(path.join(voiceDir, entry.name));
                    if (metadata) {
                        results.push(metadata);
                    }
                }
            }
        }

        return results;
    }

    public async readAudio(key: CacheKey): Promise<Buffer | null> {
        try {
            return await readFile(this.audioPath(key));
        } catch (error) {
            if (isMissing(error)) {
                return null;
            }
            throw error;
        }
    }

    public async write(clip: WordClip): Promise<void> {
        const audioPath = this.audioPath(clip.key);
        await mkdir(path.dirname(audioPath), { recursive: true });

        const sidecar: Sidecar = {
            scopeId: clip.key.scopeId,
            voiceId: clip.key.voiceId,
            word: clip.key.word,
            durationSeconds: clip.durationSeconds,
            sizeBytes: clip.audio.length,
            createdAt: clip.createdAt.toISOString()
        };

        // audio first: a sidecar is only ever visible next to complete audio
        await this.writeAtomic(audioPath, clip.audio);
        await this.writeAtomic(this.sidecarPath(clip.key), JSON.stringify(sidecar, null, 2));
    }

    public async remove(key: CacheKey): Promise<boolean> {
        const existed = await this.exists(this.sidecarPath(key));
        await rm(this.sidecarPath(key), { force: true });
        await rm(this.audioPath(key), { force: true });
        return existed;
    }

    private async writeAtomic(target: string, data: Buffer | string): Promise<void> {
        const temp = `${target}.${randomUUID()}.tmp`;
        try {
            await writeFile(temp, data);
            await rename(temp, target);
        } catch (error) {
            await rm(temp, { force: true });
            throw error;
        }
    }

    private async readSidecar(file: string): Promise<WordClipMetadata | null> {
        let parsed: Sidecar;
        try {
            const raw: unknown = JSON.parse(await readFile(file, 'utf8'));
            parsed = SidecarSchema.parse(raw);
        } catch (error) {
            this.logger?.warn({ file, error: errorMessage(error) }, 'Skipping unreadable clip metadata');
            return null;
        }

        const key: CacheKey = { scopeId: parsed.scopeId, voiceId: parsed.voiceId, word: parsed.word };
        let sizeBytes: number;
        try {
            sizeBytes = (await stat(this.audioPath(key))).size;
        } catch (error) {
            this.logger?.warn({ file, error: errorMessage(error) }, 'Skipping clip metadata without audio');
            return null;
        }

        return {
            key,
            durationSeconds: parsed.durationSeconds,
            sizeBytes,
            createdAt: new Date(parsed.createdAt)
        };
    }

    private async listDirs(dir: string): Promise<string[]> {
        try {
            const entries = await readdir(dir, { withFileTypes: true });
            return entries.filter((entry) => entry.isDirectory()).map((entry) => path.join(dir, entry.name));
        } catch (error) {
            if (isMissing(error)) {
                return [];
            }
            throw error;
        }
    }

    private async exists(file: string): Promise<boolean> {
        try {
            await stat(file);
            return true;
        } catch (error) {
            if (isMissing(error)) {
                return false;
            }
            throw error;
        }
    }

    private basePath(key: CacheKey): string {
        return path.join(
            this.rootDir,
            pathSegment(key.scopeId),
            pathSegment(key.voiceId),
            pathSegment(key.word)
        );
    }

    private audioPath(key: CacheKey): string {
        return `${this.basePath(key)}.pcm`;
    }

    private sidecarPath(key: CacheKey): string {
        return `${this.basePath(key)}.json`;
    }
}
