import type sharp from 'sharp';
import { fromRaw, type RawImage } from './encode.js';

export interface EffectsParams {
  blur?: number;
  sharpen?: number;
  brightness?: number;
  contrast?: number;
  saturation?: number;
  grayscale?: boolean;
  sepia?: boolean;
  negative?: boolean;
}

export interface EffectStep {
  label: string;
  apply: (image: sharp.Sharp) => sharp.Sharp;
}

type Matrix3x3 = [[number, number, number], [number, number, number], [number, number, number]];

const SEPIA: Matrix3x3 = [
  [0.393, 0.769, 0.189],
  [0.349, 0.686, 0.168],
  [0.272, 0.534, 0.131],
];

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Black and white stretch points (fractions) for a contrast amount in [-100, 100]. */
export function contrastStretchPoints(contrast: number): { blackPoint: number; whitePoint: number } {
  return {
    blackPoint: Math.max(0, -contrast / 100),
    whitePoint: Math.max(0, contrast / 100),
  };
}

/** The stretch points as sharp normalise() percentiles, kept inside 0 <= lower < upper <= 100. */
export function normaliseRange(contrast: number): { lower: number; upper: number } {
  const { blackPoint, whitePoint } = contrastStretchPoints(contrast);
  const lower = clamp(blackPoint * 100, 0, 99);
  const upper = clamp(100 - whitePoint * 100, lower + 1, 100);
  return { lower, upper };
}

function multiplier(amount: number): number {
  return Math.max(0, (100 + amount) / 100);
}

/**
 * Effects in their fixed application order:
 * blur, sharpen, brightness, contrast, saturation, grayscale, sepia, negative.
 */
export function planEffects(params: EffectsParams): EffectStep[] {
  const steps: EffectStep[] = [];
  const { blur, sharpen, brightness, contrast, saturation } = params;

  if (blur !== undefined) {
    steps.push({ label: `blur(${blur})`, apply: (img) => img.blur(clamp(blur, 0.3, 1000)) });
  }
  if (sharpen !== undefined) {
    steps.push({ label: `sharpen(${sharpen})`, apply: (img) => img.sharpen({ sigma: clamp(sharpen, 0.01, 10) }) });
  }
  if (brightness !== undefined) {
    steps.push({ label: `brightness(${brightness})`, apply: (img) => img.modulate({ brightness: multiplier(brightness) }) });
  }
  if (contrast !== undefined) {
    steps.push({ label: `contrast(${contrast})`, apply: (img) => img.normalise(normaliseRange(contrast)) });
  }
  if (saturation !== undefined) {
    steps.push({ label: `saturation(${saturation})`, apply: (img) => img.modulate({ saturation: multiplier(saturation) }) });
  }
  if (params.grayscale) {
    steps.push({ label: 'grayscale', apply: (img) => img.grayscale().toColourspace('srgb') });
  }
  if (params.sepia) {
    steps.push({ label: 'sepia', apply: (img) => img.recomb(SEPIA) });
  }
  if (params.negative) {
    steps.push({ label: 'negative', apply: (img) => img.negate({ alpha: false }) });
  }

  return steps;
}

// sharp orders operations internally, so each step is decoded to raw pixels before the next.
export async function applyEffectSteps(image: RawImage, steps: EffectStep[]): Promise<RawImage> {
  let current = image;
  for (const step of steps) {
    const { data, info } = await step.apply(fromRaw(current)).raw({ depth: 'uchar' }).toBuffer({ resolveWithObject: true });
    current = { data, info: { width: info.width, height: info.height, channels: info.channels } };
  }
  return current;
}
