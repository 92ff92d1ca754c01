import { z } from 'zod';
import {
  CancelledError,
  type AudioEffectsProcessor,
  type CustomFilterSettings,
  errorMessage,
  FILTER_PRESETS,
  FilterError,
  type FilterSpec,
  isFrameAligned,
  type Logger,
  ValidationError,
  VOX_PCM_FORMAT
} from '@vox/core';

export const CustomFilterSettingsSchema = z.object({
  highpassHz: z.number().min(20),
  lowpassHz: z.number().max(20_000),
  compressionRatio: z.number().min(1).max(20),
  distortion: z.number().min(0).max(1)
}).refine((settings) => settings.highpassHz < settings.lowpassHz, {
  message: 'highpassHz must be below lowpassHz',
  path: ['highpassHz']
});

export const FilterSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('preset'), preset: z.enum(['off', 'light', 'heavy']) }),
  z.object({ kind: z.literal('custom'), settings: CustomFilterSettingsSchema })
]);

/** Effect settings for a filter, or null when it is a passthrough. */
export function resolveFilterSettings(spec: FilterSpec): CustomFilterSettings | null {
  if (spec.kind === 'preset') {
    return spec.preset === 'off' ? null : { ...FILTER_PRESETS[spec.preset] };
  }

  const parsed = CustomFilterSettingsSchema.safeParse(spec.settings);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid custom filter settings',
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }
  return parsed.data;
}

export interface FilterEngineOptions {
  processor: AudioEffectsProcessor;
  logger: Logger;
}

export class FilterEngine {
  private readonly processor: AudioEffectsProcessor;
  private readonly logger: Logger;

  public constructor(options: FilterEngineOptions) {
    this.processor = options.processor;
    this.logger = options.logger;
  }

  public async apply(buffer: Buffer, spec: FilterSpec, signal?: AbortSignal): Promise<Buffer> {
    const settings = resolveFilterSettings(spec);
    if (!settings) {
      return buffer;
    }

    let output: Buffer;
    try {
      output = await this.processor.apply({ audio: buffer, format: VOX_PCM_FORMAT, settings, signal });
    } catch (error) {
      if (error instanceof CancelledError || error instanceof FilterError) {
        throw error;
      }
      throw new FilterError(`Audio effects failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!isFrameAligned(output.length)) {
      throw new FilterError(`Audio effects returned ${output.length} bytes, not a whole number of frames`);
    }

    this.logger.debug({ filter: spec.kind === 'preset' ? spec.preset : 'custom', bytes: output.length }, 'Filter applied');
    return output;
  }
}
