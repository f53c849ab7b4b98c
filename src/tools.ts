// Tool registry: name, one-line description, zod argument schema and the operation it runs.

import { z } from 'zod';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import {
  describeImage,
  editImage,
  generateImage,
  generateWithReferences,
  type GeminiContext,
} from './gemini/tools.js';
import {
  addBorder,
  applyEffects,
  compositeImages,
  convertImage,
  createThumbnail,
  cropImage,
  flipImage,
  imageInfo,
  resizeImage,
  rotateImage,
} from './raster/tools.js';
import { runTool, type ToolOutcome } from './result.js';
import { ASPECT_RATIOS, MODELS, RESOLUTIONS } from './validation.js';

/** Everything an operation may use; built once at start-up. */
export type ToolContext = GeminiContext;

export interface ToolDefinition<S extends z.ZodObject> {
  name: string;
  description: string;
  schema: S;
  run: (ctx: ToolContext, args: z.output<S>) => Promise<ToolOutcome>;
}

export interface RegisteredTool {
  name: string;
  description: string;
  inputSchema: { type: 'object'; properties: Record<string, unknown>; required: string[] };
  invoke: (ctx: ToolContext, args: unknown) => Promise<ToolOutcome>;
}

export function defineTool<S extends z.ZodObject>(def: ToolDefinition<S>): RegisteredTool {
  const json = z.toJSONSchema(def.schema, { io: 'input' });
  return {
    name: def.name,
    description: def.description,
    inputSchema: { type: 'object', properties: json.properties ?? {}, required: json.required ?? [] },
    invoke: async (ctx, args) => {
      const parsed = def.schema.safeParse(args ?? {});
      if (!parsed.success) {
        throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for ${def.name}: ${z.prettifyError(parsed.error)}`);
      }
      return runTool(() => def.run(ctx, parsed.data));
    },
  };
}

const imagePath = z.string().min(1).describe('Path to the input image');
const outputPath = z.string().min(1).optional().describe('Optional custom output path');
const model = z
  .string()
  .default(MODELS.default)
  .describe('Gemini model (gemini-2.5-flash-image for speed, gemini-3-pro-image-preview for quality)');
const aspectRatio = z.string().default(ASPECT_RATIOS.default).describe(`Aspect ratio (${ASPECT_RATIOS.allowed.join(', ')})`);
const resolution = z.string().default(RESOLUTIONS.default).describe(`Resolution (${RESOLUTIONS.allowed.join(', ')})`);
const pixels = z.number().int().positive();

export const TOOLS: RegisteredTool[] = [
  defineTool({
    name: 'gemini_generate_image',
    description: 'Generate an image from a text prompt using Gemini',
    schema: z.object({
      prompt: z.string().min(1).describe('Text description of the image to generate'),
      model,
      aspectRatio,
      resolution,
      outputPath,
    }),
    run: (ctx, args) => generateImage(ctx, args),
  }),
  defineTool({
    name: 'gemini_edit_image',
    description: 'Edit an existing image with text instructions using Gemini',
    schema: z.object({
      imagePath: imagePath.describe('Path to the image to edit'),
      prompt: z.string().min(1).describe('Instructions, e.g. "make the sky more blue"'),
      model,
      outputPath,
    }),
    run: (ctx, args) => editImage(ctx, args),
  }),
  defineTool({
    name: 'gemini_generate_with_references',
    description: 'Generate an image guided by reference images (max 3 for flash, 14 for pro)',
    schema: z.object({
      prompt: z.string().min(1).describe('Text description of the image to generate'),
      referenceImages: z.array(z.string().min(1)).describe('Paths to reference images'),
      model,
      aspectRatio,
      resolution,
      outputPath,
    }),
    run: (ctx, args) => generateWithReferences(ctx, args),
  }),
  defineTool({
    name: 'gemini_describe_image',
    description: 'Describe an image using Gemini',
    schema: z.object({
      imagePath: imagePath.describe('Path to the image to describe'),
      detailLevel: z.string().default('detailed').describe('Level of detail (brief, detailed, technical)'),
    }),
    run: (ctx, args) => describeImage(ctx, args),
  }),
  defineTool({
    name: 'image_resize',
    description: 'Resize an image, keeping its aspect ratio when only one dimension is given',
    schema: z.object({
      imagePath,
      width: pixels.optional().describe('Target width in pixels'),
      height: pixels.optional().describe('Target height in pixels'),
      maintainAspect: z.boolean().default(true).describe('Derive the missing dimension from the aspect ratio'),
      outputPath,
    }),
    run: (ctx, args) => resizeImage(ctx, args),
  }),
  defineTool({
    name: 'image_crop',
    description: 'Crop by absolute coordinates (left, top, right, bottom) or by size and gravity',
    schema: z.object({
      imagePath,
      left: z.number().int().optional(),
      top: z.number().int().optional(),
      right: z.number().int().optional(),
      bottom: z.number().int().optional(),
      width: pixels.optional(),
      height: pixels.optional(),
      gravity: z.string().default('center').describe('center, north, south, east, west, north_east, ...'),
      outputPath,
    }),
    run: (ctx, args) => cropImage(ctx, args),
  }),
  defineTool({
    name: 'image_rotate',
    description: 'Rotate an image by degrees (positive is clockwise); output keeps transparency',
    schema: z.object({
      imagePath,
      degrees: z.number().describe('Rotation angle in degrees'),
      backgroundColor: z.string().default('transparent').describe('transparent, a color name or #hex'),
      outputPath,
    }),
    run: (ctx, args) => rotateImage(ctx, args),
  }),
  defineTool({
    name: 'image_flip',
    description: 'Flip an image horizontally or vertically',
    schema: z.object({
      imagePath,
      direction: z.string().default('horizontal').describe('horizontal or vertical'),
      outputPath,
    }),
    run: (ctx, args) => flipImage(ctx, args),
  }),
  defineTool({
    name: 'image_convert',
    description: 'Convert an image to png, jpg, jpeg, webp, gif, bmp or tiff',
    schema: z.object({
      imagePath,
      targetFormat: z.string().min(1),
      quality: z.number().int().min(1).max(100).default(90).describe('Quality for lossy formats (1-100)'),
      outputPath,
    }),
    run: (ctx, args) => convertImage(ctx, args),
  }),
  defineTool({
    name: 'image_effects',
    description: 'Apply blur, sharpen, brightness, contrast, saturation, grayscale, sepia or negative',
    schema: z.object({
      imagePath,
      blur: z.number().min(0).max(100).optional(),
      sharpen: z.number().min(0).max(100).optional(),
      brightness: z.number().min(-100).max(100).optional(),
      contrast: z.number().min(-100).max(100).optional(),
      saturation: z.number().min(-100).max(100).optional(),
      grayscale: z.boolean().default(false),
      sepia: z.boolean().default(false),
      negative: z.boolean().default(false),
      outputPath,
    }),
    run: (ctx, args) => applyEffects(ctx, args),
  }),
  defineTool({
    name: 'image_composite',
    description: 'Overlay one image onto another at a pixel offset',
    schema: z.object({
      baseImage: z.string().min(1).describe('Path to the base image'),
      overlayImage: z.string().min(1).describe('Path to the overlay image'),
      positionX: z.number().int().default(0),
      positionY: z.number().int().default(0),
      opacity: z.number().min(0).max(1).default(1),
      outputPath,
    }),
    run: (ctx, args) => compositeImages(ctx, args),
  }),
  defineTool({
    name: 'image_thumbnail',
    description: 'Create a square, centre-cropped thumbnail',
    schema: z.object({
      imagePath,
      size: pixels.default(256),
      outputPath,
    }),
    run: (ctx, args) => createThumbnail(ctx, args),
  }),
  defineTool({
    name: 'image_info',
    description: 'Report format, dimensions, depth, colorspace, alpha, file size and DPI',
    schema: z.object({ imagePath }),
    run: (ctx, args) => imageInfo(ctx, args),
  }),
  defineTool({
    name: 'image_border',
    description: 'Add a solid border around an image',
    schema: z.object({
      imagePath,
      borderSize: z.number().int().min(0).default(10),
      borderColor: z.string().default('black').describe('Color name or #hex'),
      outputPath,
    }),
    run: (ctx, args) => addBorder(ctx, args),
  }),
];

export const TOOLS_BY_NAME: ReadonlyMap<string, RegisteredTool> = new Map(TOOLS.map((tool) => [tool.name, tool]));
