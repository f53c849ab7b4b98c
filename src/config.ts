import minimist from 'minimist';
import { z } from 'zod';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './common/retry.js';
import { DEFAULT_OUTPUT_DIR } from './output.js';
import { MODELS, type ModelName, isChoice } from './validation.js';

export interface ServerConfig {
  apiKey: string;
  outputDir: string;
  /** Reject invalid enum parameters instead of substituting their defaults. */
  strict: boolean;
  retry: RetryPolicy;
  describeModel: ModelName;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .optional()
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const EnvSchema = z.object({
  GEMINI_API_KEY: z.string().optional(),
  GOOGLE_API_KEY: z.string().optional(),
  DEFAULT_OUTPUT_DIR: z.string().min(1).optional(),
  STRICT_VALIDATION: flag,
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).optional(),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).optional(),
  DESCRIBE_MODEL: z.string().optional(),
});

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env, argv: string[] = process.argv.slice(2)): ServerConfig {
  const args = minimist(argv, {
    string: ['output-dir'],
    boolean: ['strict'],
    alias: { o: 'output-dir' },
  });

  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;

  const apiKey = e.GEMINI_API_KEY || e.GOOGLE_API_KEY;
  if (!apiKey) {
    throw new ConfigError('GEMINI_API_KEY environment variable is not set');
  }

  const describeModel = e.DESCRIBE_MODEL ?? MODELS.default;
  if (!isChoice(MODELS, describeModel)) {
    throw new ConfigError(`DESCRIBE_MODEL must be one of: ${MODELS.allowed.join(', ')}`);
  }

  const outputDirFlag: unknown = args['output-dir'];

  return Object.freeze({
    apiKey,
    outputDir: typeof outputDirFlag === 'string' && outputDirFlag ? outputDirFlag : (e.DEFAULT_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR),
    strict: args.strict === true || e.STRICT_VALIDATION,
    retry: {
      ...DEFAULT_RETRY_POLICY,
      maxAttempts: e.RETRY_MAX_ATTEMPTS ?? DEFAULT_RETRY_POLICY.maxAttempts,
      baseDelayMs: e.RETRY_BASE_DELAY_MS ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    },
    describeModel,
  });
}
