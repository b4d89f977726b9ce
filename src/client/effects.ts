/**
 * An effect route on the service plus the form fields it is submitted with.
 * The image key is added by the pipeline.
 */
export interface EffectRequest {
  /** Route under /categories, e.g. `faces/fat_maker` */
  path: string;
  params: Record<string, string>;
}

// Crop rectangle the web UI submits when the whole image is kept.
export const FULL_CROP = '0.0.961.1093';

export function onOff(flag: boolean): 'on' | 'off' {
  return flag ? 'on' : 'off';
}

export function fatMaker(): EffectRequest {
  return {
    path: 'faces/fat_maker',
    params: {
      'current-category': 'faces',
      'image:crop': FULL_CROP,
      size: 'XXXXXL',
    },
  };
}

export interface ClownOptions {
  includeHat?: boolean;
}

export function clown(options: ClownOptions = {}): EffectRequest {
  return {
    path: 'all_effects/clown',
    params: {
      'current-category': 'all_effects',
      'image:crop': FULL_CROP,
      hat: onOff(options.includeHat ?? false),
    },
  };
}

export const EFFECT_NAMES = ['fatify', 'clownify'] as const;

export type EffectName = (typeof EFFECT_NAMES)[number];

export function isEffectName(name: string): name is EffectName {
  return EFFECT_NAMES.some((n) => n === name);
}
