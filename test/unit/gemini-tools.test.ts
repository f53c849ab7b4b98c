import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { GenerateContentResponse } from '@google/genai';
import { DEFAULT_RETRY_POLICY } from '../../src/common/retry.js';
import {
  toGenerationResponse,
  type GenerationRequest,
  type GenerationResponse,
  type ImageBackend,
} from '../../src/gemini/backend.js';
import {
  DESCRIBE_PROMPTS,
  describeImage,
  editImage,
  generateImage,
  generateWithReferences,
  type GeminiContext,
} from '../../src/gemini/tools.js';
import { runTool } from '../../src/result.js';

type Reply = GenerationResponse | Error;

class FakeBackend implements ImageBackend {
  readonly requests: GenerationRequest[] = [];

  constructor(private readonly replies: Reply[]) {}

  async generateContent(request: GenerationRequest): Promise<GenerationResponse> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (!reply) throw new Error('no reply queued');
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

let png: Buffer;
let otherPng: Buffer;

beforeAll(async () => {
  png = await sharp({ create: { width: 8, height: 8, channels: 3, background: { r: 200, g: 40, b: 40 } } })
    .png()
    .toBuffer();
  otherPng = await sharp({ create: { width: 4, height: 4, channels: 3, background: { r: 10, g: 10, b: 220 } } })
    .png()
    .toBuffer();
});

function imageReply(text?: string, mimeType = 'image/png'): GenerationResponse {
  const parts: GenerationResponse['parts'] = [];
  if (text) parts.push({ kind: 'text', text });
  parts.push({ kind: 'image', mimeType, data: png });
  return { parts };
}

describe('Gemini operations', () => {
  let dir: string;
  let delays: number[];

  function context(backend: ImageBackend, overrides: Partial<GeminiContext> = {}): GeminiContext {
    return {
      backend,
      outputDir: path.join(dir, 'output'),
      strict: false,
      retry: DEFAULT_RETRY_POLICY,
      describeModel: 'gemini-2.5-flash-image',
      sleep: async (ms) => {
        delays.push(ms);
      },
      ...overrides,
    };
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'gemini-tools-'));
    delays = [];
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('generateImage', () => {
    it('should save the first image under a slugged, timestamped name', async () => {
      const backend = new FakeBackend([imageReply()]);
      const outcome = await generateImage(context(backend), { prompt: 'A Red Fox!' });

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;
      expect(outcome.path).toMatch(/red-fox_\d{8}_\d{6}\.png$/);
      expect(path.dirname(outcome.path ?? '')).toBe(path.join(dir, 'output'));
      expect(outcome.text).toBe(`Image saved to: ${outcome.path}`);
      expect(outcome.notes).toBeUndefined();
      expect(await fs.readFile(outcome.path ?? '')).toEqual(png);
    });

    it('should send the prompt, defaults and both modalities', async () => {
      const backend = new FakeBackend([imageReply()]);
      await generateImage(context(backend), { prompt: 'lighthouse', aspectRatio: '16:9' });

      expect(backend.requests).toEqual([
        { model: 'gemini-2.5-flash-image', prompt: 'lighthouse', images: [], wantImage: true, aspectRatio: '16:9' },
      ]);
    });

    it('should keep the last text part as model notes', async () => {
      const backend = new FakeBackend([
        { parts: [{ kind: 'text', text: 'first' }, ...imageReply('Here is your lighthouse').parts] },
      ]);
      const outcome = await generateImage(context(backend), { prompt: 'lighthouse' });
      expect(outcome).toMatchObject({ ok: true, notes: 'Here is your lighthouse' });
    });

    it('should save the last image part when several come back', async () => {
      const backend = new FakeBackend([
        {
          parts: [
            { kind: 'image', mimeType: 'image/jpeg', data: png },
            { kind: 'text', text: 'Second try is better' },
            { kind: 'image', mimeType: 'image/png', data: otherPng },
          ],
        },
      ]);
      const outcome = await generateImage(context(backend), { prompt: 'two takes' });
      const saved = outcome.ok ? outcome.path : undefined;

      expect(saved).toMatch(/two-takes_\d{8}_\d{6}\.png$/);
      expect(await fs.readFile(saved ?? '')).toEqual(otherPng);
      expect(await fs.readdir(path.join(dir, 'output'))).toHaveLength(1);
      expect(outcome).toMatchObject({ notes: 'Second try is better' });
    });

    it('should name the file after the returned MIME type', async () => {
      const backend = new FakeBackend([imageReply(undefined, 'image/jpeg')]);
      const outcome = await generateImage(context(backend), { prompt: 'mountain' });
      expect(outcome.ok && outcome.path).toMatch(/mountain_\d{8}_\d{6}\.jpg$/);
    });

    it('should re-encode when an explicit path names another format', async () => {
      const backend = new FakeBackend([imageReply()]);
      const target = path.join(dir, 'custom', 'fox.webp');
      const outcome = await generateImage(context(backend), { prompt: 'fox', outputPath: target });

      expect(outcome).toMatchObject({ ok: true, text: `Image saved to: ${target}` });
      const meta = await sharp(target).metadata();
      expect(meta.format).toBe('webp');
      expect(meta.width).toBe(8);
    });

    it('should report the model text when no image comes back', async () => {
      const backend = new FakeBackend([{ parts: [{ kind: 'text', text: 'I cannot draw that' }] }]);
      const outcome = await generateImage(context(backend), { prompt: 'anything' });
      expect(outcome).toEqual({ ok: true, text: 'No image was generated. Model response: I cannot draw that' });
    });

    it('should say No response for an empty reply', async () => {
      const backend = new FakeBackend([{ parts: [] }]);
      const outcome = await generateImage(context(backend), { prompt: 'anything' });
      expect(outcome).toEqual({ ok: true, text: 'No image was generated. Model response: No response' });
    });

    it('should substitute defaults for invalid enum values', async () => {
      const backend = new FakeBackend([imageReply()]);
      await generateImage(context(backend), { prompt: 'x', model: 'dall-e', aspectRatio: '7:3', resolution: '8K' });
      expect(backend.requests[0]).toMatchObject({ model: 'gemini-2.5-flash-image', aspectRatio: '1:1' });
    });

    it('should reject invalid enum values in strict mode without calling the backend', async () => {
      const backend = new FakeBackend([imageReply()]);
      const outcome = await runTool(() => generateImage(context(backend, { strict: true }), { prompt: 'x', model: 'dall-e' }));
      expect(outcome).toEqual({
        ok: false,
        kind: 'invalid_argument',
        message: "Invalid model 'dall-e'. Allowed: gemini-2.5-flash-image, gemini-3-pro-image-preview",
      });
      expect(backend.requests).toHaveLength(0);
    });

    it('should retry failed calls with linear backoff', async () => {
      const backend = new FakeBackend([new Error('503 overloaded'), new Error('503 overloaded'), imageReply()]);
      const outcome = await generateImage(context(backend), { prompt: 'retry me' });
      expect(outcome.ok).toBe(true);
      expect(backend.requests).toHaveLength(3);
      expect(delays).toEqual([2000, 4000]);
    });

    it('should propagate the last error once retries are exhausted', async () => {
      const backend = new FakeBackend([new Error('one'), new Error('two'), new Error('three')]);
      await expect(generateImage(context(backend), { prompt: 'doomed' })).rejects.toThrow('three');
      expect(delays).toEqual([2000, 4000]);
    });
  });

  describe('editImage', () => {
    it('should fail for a missing source file', async () => {
      const backend = new FakeBackend([]);
      const missing = path.join(dir, 'nope.png');
      const outcome = await runTool(() => editImage(context(backend), { imagePath: missing, prompt: 'brighter' }));
      expect(outcome).toEqual({ ok: false, kind: 'not_found', message: `Image file not found: ${missing}` });
      expect(backend.requests).toHaveLength(0);
    });

    it('should send the image inline and prefix the filename with edited', async () => {
      const source = path.join(dir, 'source.jpg');
      await fs.writeFile(source, png);
      const backend = new FakeBackend([imageReply('Done')]);

      const outcome = await editImage(context(backend), { imagePath: source, prompt: 'Make it blue' });

      expect(backend.requests[0].images).toEqual([{ mimeType: 'image/jpeg', data: png.toString('base64') }]);
      expect(backend.requests[0].aspectRatio).toBeUndefined();
      expect(outcome.ok && outcome.path).toMatch(/edited-make-it-blue_\d{8}_\d{6}\.png$/);
      expect(outcome).toMatchObject({ notes: 'Done' });
      expect(outcome.ok && outcome.text.startsWith('Edited image saved to: ')).toBe(true);
    });

    it('should use the edit wording when no image comes back', async () => {
      const source = path.join(dir, 'source.png');
      await fs.writeFile(source, png);
      const backend = new FakeBackend([{ parts: [{ kind: 'text', text: 'Refused' }] }]);
      const outcome = await editImage(context(backend), { imagePath: source, prompt: 'x' });
      expect(outcome).toEqual({ ok: true, text: 'No edited image was generated. Model response: Refused' });
    });
  });

  describe('generateWithReferences', () => {
    async function writeRefs(count: number): Promise<string[]> {
      const paths: string[] = [];
      for (let i = 0; i < count; i++) {
        const p = path.join(dir, `ref${i}.png`);
        await fs.writeFile(p, png);
        paths.push(p);
      }
      return paths;
    }

    it('should enforce the per-model reference limit before touching files', async () => {
      const backend = new FakeBackend([]);
      const outcome = await runTool(() =>
        generateWithReferences(context(backend), { prompt: 'x', referenceImages: ['a', 'b', 'c', 'd'] })
      );
      expect(outcome).toEqual({
        ok: false,
        kind: 'limit_exceeded',
        message: 'Maximum 3 reference images allowed for gemini-2.5-flash-image',
      });
    });

    it('should list every missing reference', async () => {
      const [existing] = await writeRefs(1);
      const a = path.join(dir, 'a.png');
      const b = path.join(dir, 'b.png');
      const outcome = await runTool(() =>
        generateWithReferences(context(new FakeBackend([])), { prompt: 'x', referenceImages: [a, existing, b] })
      );
      expect(outcome).toEqual({ ok: false, kind: 'not_found', message: `Reference images not found: ${a}, ${b}` });
    });

    it('should accept up to 14 references on the pro model', async () => {
      const refs = await writeRefs(14);
      const backend = new FakeBackend([imageReply()]);
      const outcome = await generateWithReferences(context(backend), {
        prompt: 'collage',
        referenceImages: refs,
        model: 'gemini-3-pro-image-preview',
      });
      expect(outcome.ok).toBe(true);
      expect(backend.requests[0].images).toHaveLength(14);
      expect(backend.requests[0].model).toBe('gemini-3-pro-image-preview');
    });
  });

  describe('describeImage', () => {
    it('should fail for a missing file', async () => {
      const missing = path.join(dir, 'ghost.png');
      const outcome = await runTool(() => describeImage(context(new FakeBackend([])), { imagePath: missing }));
      expect(outcome).toEqual({ ok: false, kind: 'not_found', message: `Image file not found: ${missing}` });
    });

    it('should send the template for the detail level as a text-only request', async () => {
      const source = path.join(dir, 'photo.png');
      await fs.writeFile(source, png);
      const backend = new FakeBackend([{ parts: [{ kind: 'text', text: 'A red ' }, { kind: 'text', text: 'square.' }] }]);

      const outcome = await describeImage(context(backend, { describeModel: 'gemini-3-pro-image-preview' }), {
        imagePath: source,
        detailLevel: 'brief',
      });

      expect(outcome).toEqual({ ok: true, text: 'A red square.' });
      expect(backend.requests[0]).toMatchObject({
        model: 'gemini-3-pro-image-preview',
        prompt: DESCRIBE_PROMPTS.brief,
        wantImage: false,
      });
    });

    it('should fall back to the detailed template', async () => {
      const source = path.join(dir, 'photo.png');
      await fs.writeFile(source, png);
      const backend = new FakeBackend([{ parts: [] }]);
      const outcome = await describeImage(context(backend), { imagePath: source, detailLevel: 'verbose' });
      expect(outcome).toEqual({ ok: true, text: 'Could not generate description' });
      expect(backend.requests[0].prompt).toBe(DESCRIBE_PROMPTS.detailed);
    });
  });
});

describe('toGenerationResponse', () => {
  it('should map text and inline data parts and skip thoughts', () => {
    const response = Object.assign(new GenerateContentResponse(), {
      candidates: [
        {
          content: {
            role: 'model',
            parts: [
              { text: 'thinking...', thought: true },
              { text: 'Here it is' },
              { inlineData: { mimeType: 'image/jpeg', data: Buffer.from([1, 2, 3]).toString('base64') } },
            ],
          },
        },
      ],
    });

    expect(toGenerationResponse(response)).toEqual({
      parts: [
        { kind: 'text', text: 'Here it is' },
        { kind: 'image', mimeType: 'image/jpeg', data: Buffer.from([1, 2, 3]) },
      ],
    });
  });

  it('should return no parts when there are no candidates', () => {
    expect(toGenerationResponse(new GenerateContentResponse())).toEqual({ parts: [] });
  });
});
