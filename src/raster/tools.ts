// Local raster operations on sharp. No retry: these never touch the network.

import fs from 'fs/promises';
import sharp from 'sharp';
import { NdjsonLogger } from '../common/logger.js';
import { formatFileSize } from '../common/format.js';
import { extensionOf, fileExists, resolveOutputPath } from '../output.js';
import { ToolError, success, type ToolOutcome } from '../result.js';
import { validateGravity, type Gravity } from '../validation.js';
import { applyEffectSteps, planEffects, type EffectsParams } from './effects.js';
import { alphaFormatFor, fromRaw, loadRaw, outputFormatFor, saveImage } from './encode.js';

const logger = new NdjsonLogger('raster');

export interface RasterContext {
  outputDir: string;
  strict: boolean;
}

export const CONVERT_FORMATS = ['png', 'jpg', 'jpeg', 'webp', 'gif', 'bmp', 'tiff'] as const;
export type ConvertFormat = (typeof CONVERT_FORMATS)[number];

export async function requireFile(filePath: string, label = 'Image file'): Promise<void> {
  if (!(await fileExists(filePath))) {
    throw new ToolError('not_found', `${label} not found: ${filePath}`);
  }
}

async function dimensions(filePath: string) {
  const metadata = await sharp(filePath).metadata();
  return { width: metadata.width ?? 0, height: metadata.height ?? 0, format: metadata.format };
}

function inputExtension(filePath: string): string {
  return extensionOf(filePath) || 'png';
}

function outputFor(ctx: RasterContext, seed: string, outputPath: string | undefined, extension: string) {
  return resolveOutputPath(seed, { outputDir: ctx.outputDir, explicitPath: outputPath, extension });
}

// --- resize ---

export interface ResizeParams {
  imagePath: string;
  width?: number;
  height?: number;
  maintainAspect?: boolean;
  outputPath?: string;
}

/** Fills in the missing dimension from the source aspect ratio when only one is given. */
export function targetSize(
  source: { width: number; height: number },
  width: number | undefined,
  height: number | undefined,
  maintainAspect: boolean
): { width: number; height: number } {
  if (maintainAspect && width !== undefined && height === undefined) {
    return { width, height: Math.max(1, Math.round(source.height * (width / source.width))) };
  }
  if (maintainAspect && height !== undefined && width === undefined) {
    return { width: Math.max(1, Math.round(source.width * (height / source.height))), height };
  }
  return { width: width ?? source.width, height: height ?? source.height };
}

export async function resizeImage(ctx: RasterContext, params: ResizeParams): Promise<ToolOutcome> {
  await requireFile(params.imagePath);
  if (params.width === undefined && params.height === undefined) {
    throw new ToolError('invalid_argument', 'At least one of width or height must be specified');
  }

  const source = await dimensions(params.imagePath);
  const target = targetSize(source, params.width, params.height, params.maintainAspect ?? true);

  const finalPath = await outputFor(ctx, `resized_${target.width}x${target.height}`, params.outputPath, inputExtension(params.imagePath));
  await saveImage(sharp(params.imagePath).resize(target.width, target.height, { fit: 'fill' }), finalPath, {
    format: outputFormatFor(finalPath, source.format),
  });

  logger.info('resized', { from: `${source.width}x${source.height}`, to: `${target.width}x${target.height}`, path: finalPath });
  return success(
    `Image resized from ${source.width}x${source.height} to ${target.width}x${target.height}. Saved to: ${finalPath}`,
    { path: finalPath }
  );
}

// --- crop ---

export interface CropParams {
  imagePath: string;
  left?: number;
  top?: number;
  right?: number;
  bottom?: number;
  width?: number;
  height?: number;
  gravity?: string;
  outputPath?: string;
}

export interface Region {
  left: number;
  top: number;
  width: number;
  height: number;
}

export function gravityRegion(
  source: { width: number; height: number },
  width: number,
  height: number,
  gravity: Gravity
): Region {
  const w = Math.min(width, source.width);
  const h = Math.min(height, source.height);

  let left = Math.floor((source.width - w) / 2);
  if (gravity.endsWith('west')) left = 0;
  else if (gravity.endsWith('east')) left = source.width - w;

  let top = Math.floor((source.height - h) / 2);
  if (gravity.startsWith('north')) top = 0;
  else if (gravity.startsWith('south')) top = source.height - h;

  return { left, top, width: w, height: h };
}

export function absoluteRegion(
  source: { width: number; height: number },
  box: { left: number; top: number; right: number; bottom: number }
): Region {
  const left = Math.max(0, box.left);
  const top = Math.max(0, box.top);
  const right = Math.min(source.width, box.right);
  const bottom = Math.min(source.height, box.bottom);
  if (right <= left || bottom <= top) {
    throw new ToolError('invalid_argument', 'Crop region is empty');
  }
  return { left, top, width: right - left, height: bottom - top };
}

export async function cropImage(ctx: RasterContext, params: CropParams): Promise<ToolOutcome> {
  await requireFile(params.imagePath);
  const source = await dimensions(params.imagePath);

  const { left, top, right, bottom, width, height } = params;
  let region: Region;
  if (left !== undefined && top !== undefined && right !== undefined && bottom !== undefined) {
    region = absoluteRegion(source, { left, top, right, bottom });
  } else if (width !== undefined && height !== undefined) {
    const gravity = validateGravity(params.gravity ?? 'center', { strict: ctx.strict });
    region = gravityRegion(source, width, height, gravity);
  } else {
    throw new ToolError('invalid_argument', 'Provide either (left, top, right, bottom) or (width, height, gravity)');
  }

  const finalPath = await outputFor(ctx, `cropped_${region.width}x${region.height}`, params.outputPath, inputExtension(params.imagePath));
  await saveImage(sharp(params.imagePath).extract(region), finalPath, { format: outputFormatFor(finalPath, source.format) });

  logger.info('cropped', { region, path: finalPath });
  return success(
    `Image cropped from ${source.width}x${source.height} to ${region.width}x${region.height}. Saved to: ${finalPath}`,
    { path: finalPath }
  );
}

// --- rotate ---

export interface RotateParams {
  imagePath: string;
  degrees: number;
  backgroundColor?: string;
  outputPath?: string;
}

function parseBackground(color: string): sharp.Color {
  return color.trim().toLowerCase() === 'transparent' ? { r: 0, g: 0, b: 0, alpha: 0 } : color;
}

export async function rotateImage(ctx: RasterContext, params: RotateParams): Promise<ToolOutcome> {
  await requireFile(params.imagePath);
  const { degrees } = params;

  const raw = await loadRaw(params.imagePath, { alpha: true });
  const finalPath = await outputFor(ctx, `rotated_${degrees}deg`, params.outputPath, 'png');
  await saveImage(fromRaw(raw).rotate(degrees, { background: parseBackground(params.backgroundColor ?? 'transparent') }), finalPath, {
    format: alphaFormatFor(finalPath),
  });

  logger.info('rotated', { degrees, path: finalPath });
  return success(`Image rotated ${degrees} degrees. Saved to: ${finalPath}`, { path: finalPath });
}

// --- flip ---

export interface FlipParams {
  imagePath: string;
  direction?: string;
  outputPath?: string;
}

export async function flipImage(ctx: RasterContext, params: FlipParams): Promise<ToolOutcome> {
  await requireFile(params.imagePath);
  const direction = params.direction ?? 'horizontal';
  if (direction !== 'horizontal' && direction !== 'vertical') {
    throw new ToolError('invalid_argument', "Direction must be 'horizontal' or 'vertical'");
  }

  const source = await dimensions(params.imagePath);
  const image = sharp(params.imagePath);
  const flipped = direction === 'horizontal' ? image.flop() : image.flip();

  const finalPath = await outputFor(ctx, `flipped_${direction}`, params.outputPath, inputExtension(params.imagePath));
  await saveImage(flipped, finalPath, { format: outputFormatFor(finalPath, source.format) });

  logger.info('flipped', { direction, path: finalPath });
  return success(`Image flipped ${direction}. Saved to: ${finalPath}`, { path: finalPath });
}

// --- convert ---

export interface ConvertParams {
  imagePath: string;
  targetFormat: string;
  quality?: number;
  outputPath?: string;
}

function isConvertFormat(value: string): value is ConvertFormat {
  return CONVERT_FORMATS.some((format) => format === value);
}

export async function convertImage(ctx: RasterContext, params: ConvertParams): Promise<ToolOutcome> {
  await requireFile(params.imagePath);
  const target = params.targetFormat.toLowerCase();
  if (!isConvertFormat(target)) {
    throw new ToolError('invalid_argument', `Invalid format. Supported: ${CONVERT_FORMATS.join(', ')}`);
  }

  const finalPath = await outputFor(ctx, 'converted', params.outputPath, target);
  await saveImage(sharp(params.imagePath), finalPath, {
    format: target === 'jpg' ? 'jpeg' : target,
    quality: params.quality ?? 90,
  });

  logger.info('converted', { format: target, path: finalPath });
  return success(`Image converted to ${target}. Saved to: ${finalPath}`, { path: finalPath });
}

// --- effects ---

export interface EffectsToolParams extends EffectsParams {
  imagePath: string;
  outputPath?: string;
}

export async function applyEffects(ctx: RasterContext, params: EffectsToolParams): Promise<ToolOutcome> {
  const steps = planEffects(params);
  if (steps.length === 0) {
    throw new ToolError('no_effects', 'No effects specified');
  }
  await requireFile(params.imagePath);

  const source = await dimensions(params.imagePath);
  const result = await applyEffectSteps(await loadRaw(params.imagePath), steps);

  const labels = steps.map((step) => step.label);
  const finalPath = await outputFor(ctx, `effects_${labels.slice(0, 3).join('_')}`, params.outputPath, inputExtension(params.imagePath));
  await saveImage(fromRaw(result), finalPath, { format: outputFormatFor(finalPath, source.format) });

  logger.info('effects_applied', { effects: labels, path: finalPath });
  return success(`Applied effects: ${labels.join(', ')}. Saved to: ${finalPath}`, { path: finalPath });
}

// --- composite ---

export interface CompositeParams {
  baseImage: string;
  overlayImage: string;
  positionX?: number;
  positionY?: number;
  opacity?: number;
  outputPath?: string;
}

/** Scales an RGBA buffer's alpha band in place. */
function scaleAlpha(rgba: Buffer, opacity: number): Buffer {
  for (let i = 3; i < rgba.length; i += 4) {
    rgba[i] = Math.round(rgba[i] * opacity);
  }
  return rgba;
}

/**
 * The part of an overlay placed at (x, y) that lands on the base canvas:
 * `region` in overlay coordinates, `left`/`top` on the base. Undefined when nothing overlaps.
 */
export function clipOverlay(
  base: { width: number; height: number },
  overlay: { width: number; height: number },
  x: number,
  y: number
): { region: Region; left: number; top: number } | undefined {
  const left = Math.max(0, x);
  const top = Math.max(0, y);
  const right = Math.min(base.width, x + overlay.width);
  const bottom = Math.min(base.height, y + overlay.height);
  if (right <= left || bottom <= top) {
    return undefined;
  }
  return { region: { left: left - x, top: top - y, width: right - left, height: bottom - top }, left, top };
}

export async function compositeImages(ctx: RasterContext, params: CompositeParams): Promise<ToolOutcome> {
  await requireFile(params.baseImage, 'Base image');
  await requireFile(params.overlayImage, 'Overlay image');

  const opacity = Math.min(1, Math.max(0, params.opacity ?? 1));
  const overlay = await loadRaw(params.overlayImage, { alpha: true });
  if (opacity < 1) scaleAlpha(overlay.data, opacity);

  const base = await dimensions(params.baseImage);
  const clip = clipOverlay(base, overlay.info, params.positionX ?? 0, params.positionY ?? 0);

  // sharp rejects overlays that extend past the base, so only the visible part is pasted.
  let composited = sharp(params.baseImage).ensureAlpha();
  if (clip) {
    const visible = await fromRaw(overlay).extract(clip.region).raw().toBuffer();
    composited = composited.composite([
      {
        input: visible,
        raw: { width: clip.region.width, height: clip.region.height, channels: overlay.info.channels },
        left: clip.left,
        top: clip.top,
      },
    ]);
  } else {
    logger.info('overlay_outside_base', { base: `${base.width}x${base.height}`, x: params.positionX, y: params.positionY });
  }

  const finalPath = await outputFor(ctx, 'composited', params.outputPath, 'png');
  await saveImage(composited, finalPath, { format: alphaFormatFor(finalPath) });

  logger.info('composited', { base: params.baseImage, overlay: params.overlayImage, opacity, path: finalPath });
  return success(`Images composited. Saved to: ${finalPath}`, { path: finalPath });
}

// --- thumbnail ---

export interface ThumbnailParams {
  imagePath: string;
  size?: number;
  outputPath?: string;
}

export async function createThumbnail(ctx: RasterContext, params: ThumbnailParams): Promise<ToolOutcome> {
  await requireFile(params.imagePath);
  const size = params.size ?? 256;
  const source = await dimensions(params.imagePath);

  const finalPath = await outputFor(ctx, `thumb_${size}`, params.outputPath, inputExtension(params.imagePath));
  await saveImage(sharp(params.imagePath).resize(size, size, { fit: 'cover', position: 'centre' }), finalPath, {
    format: outputFormatFor(finalPath, source.format),
  });

  logger.info('thumbnail', { size, path: finalPath });
  return success(`Thumbnail created (${size}x${size}). Saved to: ${finalPath}`, { path: finalPath });
}

// --- info ---

const BITS_PER_SAMPLE: Record<string, number> = {
  char: 8,
  uchar: 8,
  short: 16,
  ushort: 16,
  int: 32,
  uint: 32,
  float: 32,
  complex: 64,
  double: 64,
  dpcomplex: 128,
};

export async function imageInfo(_ctx: RasterContext, params: { imagePath: string }): Promise<ToolOutcome> {
  await requireFile(params.imagePath);
  const stats = await fs.stat(params.imagePath);
  const metadata = await sharp(params.imagePath).metadata();

  const density = metadata.density;
  const info: Array<[string, string | number | boolean]> = [
    ['path', params.imagePath],
    ['format', (metadata.format ?? 'unknown').toUpperCase()],
    ['width', metadata.width ?? 0],
    ['height', metadata.height ?? 0],
    ['depth', metadata.depth ? (BITS_PER_SAMPLE[metadata.depth] ?? metadata.depth) : 'unknown'],
    ['colorspace', metadata.space ?? 'unknown'],
    ['has_alpha', metadata.hasAlpha ?? false],
    ['file_size', formatFileSize(stats.size)],
    ['resolution', density ? `${Math.round(density)}x${Math.round(density)} DPI` : 'Unknown'],
  ];

  const lines = info.map(([key, value]) => `  ${key}: ${value}`).join('\n');
  return success(`Image Information:\n${lines}`);
}

// --- border ---

export interface BorderParams {
  imagePath: string;
  borderSize?: number;
  borderColor?: string;
  outputPath?: string;
}

export async function addBorder(ctx: RasterContext, params: BorderParams): Promise<ToolOutcome> {
  await requireFile(params.imagePath);
  const size = params.borderSize ?? 10;
  const color = params.borderColor ?? 'black';
  const source = await dimensions(params.imagePath);

  const bordered = sharp(params.imagePath).extend({ top: size, bottom: size, left: size, right: size, background: color });

  const finalPath = await outputFor(ctx, `bordered_${size}px`, params.outputPath, inputExtension(params.imagePath));
  await saveImage(bordered, finalPath, { format: outputFormatFor(finalPath, source.format) });

  logger.info('bordered', { size, color, path: finalPath });
  return success(`Added ${size}px ${color} border. Saved to: ${finalPath}`, { path: finalPath });
}
