// Thin seam over @google/genai so image operations can run against a fake in tests.

import { GoogleGenAI, Modality } from '@google/genai';
import type { GenerateContentConfig, GenerateContentResponse, Part } from '@google/genai';
import { withSpan } from '../telemetry/tracing.js';

export interface InlineImage {
  mimeType: string;
  /** base64-encoded bytes */
  data: string;
}

export interface GenerationRequest {
  model: string;
  prompt: string;
  images: InlineImage[];
  /** Ask for TEXT and IMAGE modalities; text-only otherwise. */
  wantImage: boolean;
  aspectRatio?: string;
}

export type ResponsePart =
  | { kind: 'text'; text: string }
  | { kind: 'image'; mimeType: string; data: Buffer };

export interface GenerationResponse {
  parts: ResponsePart[];
}

export interface ImageBackend {
  generateContent(request: GenerationRequest): Promise<GenerationResponse>;
}

export class GeminiBackend implements ImageBackend {
  private readonly client: GoogleGenAI;

  constructor(apiKey: string) {
    this.client = new GoogleGenAI({ apiKey });
  }

  async generateContent(request: GenerationRequest): Promise<GenerationResponse> {
    const parts: Part[] = [
      { text: request.prompt },
      ...request.images.map((image) => ({ inlineData: { mimeType: image.mimeType, data: image.data } })),
    ];

    const config: GenerateContentConfig = {};
    if (request.wantImage) {
      config.responseModalities = [Modality.TEXT, Modality.IMAGE];
    }
    if (request.aspectRatio) {
      config.imageConfig = { aspectRatio: request.aspectRatio };
    }

    const response = await withSpan(
      'gemini.generate_content',
      () =>
        this.client.models.generateContent({
          model: request.model,
          contents: [{ role: 'user', parts }],
          config,
        }),
      {
        'api.model': request.model,
        'api.images': request.images.length,
        'api.want_image': request.wantImage,
      }
    );

    return toGenerationResponse(response);
  }
}

export function toGenerationResponse(response: GenerateContentResponse): GenerationResponse {
  const parts: ResponsePart[] = [];
  for (const part of response.candidates?.[0]?.content?.parts ?? []) {
    if (part.thought) continue;
    if (part.text) {
      parts.push({ kind: 'text', text: part.text });
    } else if (part.inlineData?.data) {
      parts.push({
        kind: 'image',
        mimeType: part.inlineData.mimeType ?? 'image/png',
        data: Buffer.from(part.inlineData.data, 'base64'),
      });
    }
  }
  return { parts };
}
