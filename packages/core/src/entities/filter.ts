export type FilterPresetName = 'off' | 'light' | 'heavy';

export interface CustomFilterSettings {
  highpassHz      : number;
  lowpassHz       : number;
  compressionRatio: number;
  /** 0 (clean) to 1 (fully driven). */
  distortion      : number;
}

export type FilterSpec =
  | { kind: 'preset'; preset: FilterPresetName }
  | { kind: 'custom'; settings: CustomFilterSettings };

export const FILTER_PRESETS: Readonly<Record<Exclude<FilterPresetName, 'off'>, CustomFilterSettings>> = Object.freeze({
  light: { highpassHz: 300, lowpassHz: 3400, compressionRatio: 2, distortion: 0.1 },
  heavy: { highpassHz: 500, lowpassHz: 2800, compressionRatio: 6, distortion: 0.35 }
});

export function presetFilter(preset: FilterPresetName): FilterSpec {
  return { kind: 'preset', preset };
}

export function customFilter(settings: CustomFilterSettings): FilterSpec {
  return { kind: 'custom', settings };
}

export const FILTER_OFF: FilterSpec = presetFilter('off');
