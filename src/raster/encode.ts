import sharp from 'sharp';
import { encodeBmp } from './bmp.js';
import { extensionOf, writeAtomic, writeFileAtomic } from '../output.js';

export type OutputFormat = 'png' | 'jpeg' | 'webp' | 'gif' | 'tiff' | 'avif' | 'bmp';

const FORMAT_BY_EXTENSION: Record<string, OutputFormat> = {
  png: 'png',
  jpg: 'jpeg',
  jpeg: 'jpeg',
  webp: 'webp',
  gif: 'gif',
  tif: 'tiff',
  tiff: 'tiff',
  avif: 'avif',
  bmp: 'bmp',
};

// sharp's metadata().format names that it can also write
const WRITABLE_INPUT_FORMATS: Record<string, OutputFormat> = {
  png: 'png',
  jpeg: 'jpeg',
  jpg: 'jpeg',
  webp: 'webp',
  gif: 'gif',
  tiff: 'tiff',
  tif: 'tiff',
  avif: 'avif',
};

const ALPHA_FORMATS: ReadonlySet<OutputFormat> = new Set(['png', 'webp', 'gif', 'tiff', 'avif']);

const LOSSY_FORMATS: ReadonlySet<OutputFormat> = new Set(['jpeg', 'webp']);

export function formatForExtension(ext: string): OutputFormat | undefined {
  return FORMAT_BY_EXTENSION[ext.toLowerCase()];
}

/** Encoder for a destination: its extension first, then the input's own format, then PNG. */
export function outputFormatFor(dstPath: string, inputFormat?: string): OutputFormat {
  return (
    formatForExtension(extensionOf(dstPath)) ?? (inputFormat ? WRITABLE_INPUT_FORMATS[inputFormat] : undefined) ?? 'png'
  );
}

/** PNG unless the destination already names a format that keeps transparency. */
export function alphaFormatFor(dstPath: string): OutputFormat {
  const format = formatForExtension(extensionOf(dstPath));
  return format && ALPHA_FORMATS.has(format) ? format : 'png';
}

export interface SaveOptions {
  format: OutputFormat;
  quality?: number;
}

export async function saveImage(pipeline: sharp.Sharp, dstPath: string, options: SaveOptions): Promise<void> {
  if (options.format === 'bmp') {
    const { data, info } = await pipeline
      .toColourspace('srgb')
      .ensureAlpha()
      .raw({ depth: 'uchar' })
      .toBuffer({ resolveWithObject: true });
    await writeFileAtomic(dstPath, encodeBmp(data, info.width, info.height, 4));
    return;
  }

  const format = options.format;
  const encoderOptions = options.quality !== undefined && LOSSY_FORMATS.has(format) ? { quality: options.quality } : {};
  await writeAtomic(dstPath, (tempPath) => pipeline.toFormat(format, encoderOptions).toFile(tempPath));
}

export interface RawImage {
  data: Buffer;
  info: { width: number; height: number; channels: 1 | 2 | 3 | 4 };
}

/** Decode to 8-bit interleaved pixels, optionally forcing an alpha band. */
export async function loadRaw(input: string | Buffer, options: { alpha?: boolean } = {}): Promise<RawImage> {
  let pipeline = sharp(input).toColourspace('srgb');
  if (options.alpha) pipeline = pipeline.ensureAlpha();
  const { data, info } = await pipeline.raw({ depth: 'uchar' }).toBuffer({ resolveWithObject: true });
  return { data, info: { width: info.width, height: info.height, channels: info.channels } };
}

export function fromRaw(image: RawImage): sharp.Sharp {
  return sharp(image.data, { raw: image.info });
}
