// Generation, edit, reference-guided generation and description via the generative backend.

import fs from 'fs/promises';
import sharp from 'sharp';
import { NdjsonLogger } from '../common/logger.js';
import { extensionForMime, guessMimeType } from '../common/mime.js';
import { callWithRetry, type RetryPolicy, type Sleep } from '../common/retry.js';
import { extensionOf, fileExists, resolveOutputPath, writeFileAtomic } from '../output.js';
import { formatForExtension, saveImage } from '../raster/encode.js';
import { ToolError, success, type ToolOutcome } from '../result.js';
import {
  checkReferenceCount,
  validateAspectRatio,
  validateDetailLevel,
  validateModel,
  validateResolution,
  type DetailLevel,
} from '../validation.js';
import type { GenerationRequest, GenerationResponse, ImageBackend, InlineImage } from './backend.js';

const logger = new NdjsonLogger('gemini');

export interface GeminiContext {
  backend: ImageBackend;
  outputDir: string;
  strict: boolean;
  retry: RetryPolicy;
  describeModel: string;
  sleep?: Sleep;
}

export const DESCRIBE_PROMPTS: Record<DetailLevel, string> = {
  brief: 'Describe this image in one or two sentences.',
  detailed:
    'Provide a detailed description of this image, including the main subjects, colors, composition, and mood.',
  technical:
    'Provide a technical analysis of this image, including composition, lighting, color palette, style, and any text visible. Also note the apparent resolution and image quality.',
};

async function readInlineImage(filePath: string): Promise<InlineImage> {
  const bytes = await fs.readFile(filePath);
  return { mimeType: guessMimeType(filePath), data: bytes.toString('base64') };
}

function request(ctx: GeminiContext, req: GenerationRequest): Promise<GenerationResponse> {
  return callWithRetry(() => ctx.backend.generateContent(req), ctx.retry, {
    sleep: ctx.sleep,
    label: `${req.model} generateContent`,
  });
}

interface ScannedResponse {
  text: string;
  image?: { mimeType: string; data: Buffer };
}

// Later parts win: the last text part is the notes, the last image part the result.
function scan(response: GenerationResponse): ScannedResponse {
  const scanned: ScannedResponse = { text: '' };
  for (const part of response.parts) {
    if (part.kind === 'text') {
      scanned.text = part.text;
    } else {
      scanned.image = { mimeType: part.mimeType, data: part.data };
    }
  }
  return scanned;
}

/**
 * Writes returned image bytes. Without an explicit path the extension follows
 * the MIME type; an explicit path naming another format is re-encoded.
 */
async function persistImage(
  ctx: GeminiContext,
  seedText: string,
  image: { mimeType: string; data: Buffer },
  outputPath?: string
): Promise<string> {
  const sourceExt = extensionForMime(image.mimeType);
  const finalPath = await resolveOutputPath(seedText, { outputDir: ctx.outputDir, explicitPath: outputPath, extension: sourceExt });

  const wanted = formatForExtension(extensionOf(finalPath));
  if (wanted && wanted !== formatForExtension(sourceExt)) {
    await saveImage(sharp(image.data), finalPath, { format: wanted });
  } else {
    await writeFileAtomic(finalPath, image.data);
  }
  return finalPath;
}

async function finish(
  ctx: GeminiContext,
  response: GenerationResponse,
  seedText: string,
  outputPath: string | undefined,
  noun: 'Image' | 'Edited image'
): Promise<ToolOutcome> {
  const { text, image } = scan(response);
  if (!image) {
    const lead = noun === 'Image' ? 'No image was generated.' : 'No edited image was generated.';
    logger.info('no_image', { textLength: text.length });
    return success(`${lead} Model response: ${text || 'No response'}`);
  }

  const finalPath = await persistImage(ctx, seedText, image, outputPath);
  logger.info('image_saved', { path: finalPath, mimeType: image.mimeType, bytes: image.data.length });
  return success(`${noun} saved to: ${finalPath}`, { path: finalPath, notes: text || undefined });
}

export interface GenerateParams {
  prompt: string;
  model?: string;
  aspectRatio?: string;
  resolution?: string;
  outputPath?: string;
}

export async function generateImage(ctx: GeminiContext, params: GenerateParams): Promise<ToolOutcome> {
  const opts = { strict: ctx.strict };
  const model = validateModel(params.model ?? 'gemini-2.5-flash-image', opts);
  const aspectRatio = validateAspectRatio(params.aspectRatio ?? '1:1', opts);
  // The API-key endpoint takes no image size, so resolution is validated and logged only.
  const resolution = validateResolution(params.resolution ?? '1K', opts);

  logger.info('generate', { model, aspectRatio, resolution });
  const response = await request(ctx, { model, prompt: params.prompt, images: [], wantImage: true, aspectRatio });
  return finish(ctx, response, params.prompt, params.outputPath, 'Image');
}

export interface EditParams {
  imagePath: string;
  prompt: string;
  model?: string;
  outputPath?: string;
}

export async function editImage(ctx: GeminiContext, params: EditParams): Promise<ToolOutcome> {
  const model = validateModel(params.model ?? 'gemini-2.5-flash-image', { strict: ctx.strict });
  if (!(await fileExists(params.imagePath))) {
    throw new ToolError('not_found', `Image file not found: ${params.imagePath}`);
  }

  logger.info('edit', { imagePath: params.imagePath, model });
  const image = await readInlineImage(params.imagePath);
  const response = await request(ctx, { model, prompt: params.prompt, images: [image], wantImage: true });
  return finish(ctx, response, `edited_${params.prompt}`, params.outputPath, 'Edited image');
}

export interface ReferenceParams extends GenerateParams {
  referenceImages: string[];
}

export async function generateWithReferences(ctx: GeminiContext, params: ReferenceParams): Promise<ToolOutcome> {
  const opts = { strict: ctx.strict };
  const model = validateModel(params.model ?? 'gemini-2.5-flash-image', opts);
  const aspectRatio = validateAspectRatio(params.aspectRatio ?? '1:1', opts);
  const resolution = validateResolution(params.resolution ?? '1K', opts);

  checkReferenceCount(model, params.referenceImages.length);

  const missing: string[] = [];
  for (const ref of params.referenceImages) {
    if (!(await fileExists(ref))) missing.push(ref);
  }
  if (missing.length > 0) {
    throw new ToolError('not_found', `Reference images not found: ${missing.join(', ')}`);
  }

  logger.info('generate_with_references', { references: params.referenceImages.length, model, aspectRatio, resolution });
  const images = await Promise.all(params.referenceImages.map(readInlineImage));
  const response = await request(ctx, { model, prompt: params.prompt, images, wantImage: true, aspectRatio });
  return finish(ctx, response, params.prompt, params.outputPath, 'Image');
}

export interface DescribeParams {
  imagePath: string;
  detailLevel?: string;
}

export async function describeImage(ctx: GeminiContext, params: DescribeParams): Promise<ToolOutcome> {
  if (!(await fileExists(params.imagePath))) {
    throw new ToolError('not_found', `Image file not found: ${params.imagePath}`);
  }
  const detailLevel = validateDetailLevel(params.detailLevel ?? 'detailed', { strict: ctx.strict });

  logger.info('describe', { imagePath: params.imagePath, detailLevel });
  const image = await readInlineImage(params.imagePath);
  const response = await request(ctx, {
    model: ctx.describeModel,
    prompt: DESCRIBE_PROMPTS[detailLevel],
    images: [image],
    wantImage: false,
  });

  const text = response.parts
    .flatMap((part) => (part.kind === 'text' ? [part.text] : []))
    .join('');
  return success(text || 'Could not generate description');
}
