// Allow-list validation for enum-like tool parameters.
// Invalid values degrade to a documented default with a warning unless strict mode is on.

import { NdjsonLogger } from './common/logger.js';
import { ToolError } from './result.js';

const logger = new NdjsonLogger('validation');

export interface ChoiceSpec<T extends string> {
  name: string;
  allowed: readonly T[];
  default: T;
  normalize?: (value: string) => string;
}

export interface ValidateOptions {
  strict?: boolean;
}

export function isChoice<T extends string>(spec: ChoiceSpec<T>, value: string): value is T {
  return spec.allowed.some((allowed) => allowed === value);
}

export function validateChoice<T extends string>(
  value: string,
  spec: ChoiceSpec<T>,
  options: ValidateOptions = {}
): T {
  const normalized = spec.normalize ? spec.normalize(value) : value;
  if (isChoice(spec, normalized)) {
    return normalized;
  }

  if (options.strict) {
    throw new ToolError(
      'invalid_argument',
      `Invalid ${spec.name} '${value}'. Allowed: ${spec.allowed.join(', ')}`
    );
  }

  logger.warn('invalid_parameter', {
    message: `Invalid ${spec.name} '${normalized}', defaulting to ${spec.default}`,
    parameter: spec.name,
    rejected: normalized,
    substituted: spec.default,
  });
  return spec.default;
}

export const MODELS = {
  name: 'model',
  allowed: ['gemini-2.5-flash-image', 'gemini-3-pro-image-preview'],
  default: 'gemini-2.5-flash-image',
} as const satisfies ChoiceSpec<string>;

export type ModelName = (typeof MODELS.allowed)[number];

export const ASPECT_RATIOS = {
  name: 'aspect ratio',
  allowed: ['1:1', '2:3', '3:2', '3:4', '4:3', '4:5', '5:4', '9:16', '16:9', '21:9'],
  default: '1:1',
} as const satisfies ChoiceSpec<string>;

export type AspectRatio = (typeof ASPECT_RATIOS.allowed)[number];

export const RESOLUTIONS = {
  name: 'resolution',
  allowed: ['1K', '2K', '4K'],
  default: '1K',
  normalize: (value: string) => value.toUpperCase(),
} as const satisfies ChoiceSpec<string>;

export type Resolution = (typeof RESOLUTIONS.allowed)[number];

export const GRAVITIES = {
  name: 'gravity',
  allowed: [
    'center',
    'north',
    'south',
    'east',
    'west',
    'north_east',
    'north_west',
    'south_east',
    'south_west',
  ],
  default: 'center',
  normalize: (value: string) => value.toLowerCase(),
} as const satisfies ChoiceSpec<string>;

export type Gravity = (typeof GRAVITIES.allowed)[number];

export const DETAIL_LEVELS = {
  name: 'detail level',
  allowed: ['brief', 'detailed', 'technical'],
  default: 'detailed',
} as const satisfies ChoiceSpec<string>;

export type DetailLevel = (typeof DETAIL_LEVELS.allowed)[number];

export function validateModel(value: string, options?: ValidateOptions): ModelName {
  return validateChoice<ModelName>(value, MODELS, options);
}

export function validateAspectRatio(value: string, options?: ValidateOptions): AspectRatio {
  return validateChoice<AspectRatio>(value, ASPECT_RATIOS, options);
}

export function validateResolution(value: string, options?: ValidateOptions): Resolution {
  return validateChoice<Resolution>(value, RESOLUTIONS, options);
}

export function validateGravity(value: string, options?: ValidateOptions): Gravity {
  return validateChoice<Gravity>(value, GRAVITIES, options);
}

export function validateDetailLevel(value: string, options?: ValidateOptions): DetailLevel {
  return validateChoice<DetailLevel>(value, DETAIL_LEVELS, options);
}

export function maxReferenceImages(model: string): number {
  return model.includes('3-pro') ? 14 : 3;
}

/** Throws a `limit_exceeded` ToolError when the reference count is outside 1..max for the model. */
export function checkReferenceCount(model: string, count: number): void {
  const max = maxReferenceImages(model);
  if (count > max) {
    throw new ToolError('limit_exceeded', `Maximum ${max} reference images allowed for ${model}`);
  }
  if (count < 1) {
    throw new ToolError('invalid_argument', 'At least one reference image is required');
  }
}
