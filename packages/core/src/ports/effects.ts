import { type RuntimeResource } from '../lifecycle';
import type { CustomFilterSettings } from '../entities/filter';
import type { PcmFormat } from '../audio/format';

export interface ApplyEffectsOptions {
  audio   : Buffer;
  format  : PcmFormat;
  /** Highpass, lowpass, compression, then distortion, in that order. */
  settings: CustomFilterSettings;
  signal? : AbortSignal;
}

export interface AudioEffectsProcessor extends RuntimeResource {
  apply(options: ApplyEffectsOptions): Promise<Buffer>;
}
