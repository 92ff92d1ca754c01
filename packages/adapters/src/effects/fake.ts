import { type ApplyEffectsOptions, type AudioEffectsProcessor } from '@vox/core';

export class FakeEffectsProcessor implements AudioEffectsProcessor {
    public readonly calls: ApplyEffectsOptions[] = [];
    private failure: Error | null = null;
    private transform: ((audio: Buffer) => Buffer) | null = null;

    public async start(): Promise<void> { }
    public async close(): Promise<void> { }

    public failWith(error: Error): void {
        this.failure = error;
    }

    public respondWith(transform: (audio: Buffer) => Buffer): void {
        this.transform = transform;
    }

    public async apply(options: ApplyEffectsOptions): Promise<Buffer> {
        this.calls.push(options);
        if (this.failure) {
            throw this.failure;
        }
        return this.transform ? this.transform(options.audio) : Buffer.from(options.audio);
    }
}
