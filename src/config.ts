import { z } from 'zod';

const envSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().optional(),
  MMBATCH_MODEL: z.string().min(1).default('gpt-4o-mini'),
  MMBATCH_BATCH_SIZE: z.coerce.number().int().positive().default(20),
  MMBATCH_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  MMBATCH_JOB_TIMEOUT_SECONDS: z.coerce.number().positive().default(600),
  MMBATCH_POLL_INTERVAL_SECONDS: z.coerce.number().positive().default(30),
  MMBATCH_COMPLETION_WINDOW: z.string().default('24h'),
  MMBATCH_DELAY_SUCCESS_SECONDS: z.coerce.number().nonnegative().default(30),
  MMBATCH_DELAY_FAILURE_SECONDS: z.coerce.number().nonnegative().default(60),
  MMBATCH_DELAY_RETRY_SECONDS: z.coerce.number().nonnegative().default(120),
  MMBATCH_RESULTS_DIR: z.string().min(1).default('output'),
  MMBATCH_IMAGE_COLUMN: z.string().min(1).default('image_path'),
  MMBATCH_PROMPT_COLUMN: z.string().min(1).default('prompt'),
  MMBATCH_MAX_IMAGE_MB: z.coerce.number().positive().default(20),
  MMBATCH_MAX_PROMPT_CHARS: z.coerce.number().int().positive().default(4000),
  MMBATCH_MAX_TOKENS: z.coerce.number().int().positive().default(1000),
  MMBATCH_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  MMBATCH_VERIFY: z.enum(['overlap', 'exact']).default('overlap'),
});

function toConfig(env: z.infer<typeof envSchema>) {
  return {
    openai: {
      apiKey: env.OPENAI_API_KEY ?? '',
      baseUrl: env.OPENAI_BASE_URL?.replace(/\/$/, ''),
      model: env.MMBATCH_MODEL,
    },
    batch: {
      batchSize: env.MMBATCH_BATCH_SIZE,
      maxAttempts: env.MMBATCH_MAX_ATTEMPTS,
      jobTimeoutMs: env.MMBATCH_JOB_TIMEOUT_SECONDS * 1000,
      pollIntervalMs: env.MMBATCH_POLL_INTERVAL_SECONDS * 1000,
      completionWindow: env.MMBATCH_COMPLETION_WINDOW,
      verify: env.MMBATCH_VERIFY,
      runDir: env.MMBATCH_RESULTS_DIR,
    },
    delays: {
      successDelayMs: env.MMBATCH_DELAY_SUCCESS_SECONDS * 1000,
      failureDelayMs: env.MMBATCH_DELAY_FAILURE_SECONDS * 1000,
      retryDelayMs: env.MMBATCH_DELAY_RETRY_SECONDS * 1000,
    },
    records: {
      imageColumn: env.MMBATCH_IMAGE_COLUMN,
      promptColumn: env.MMBATCH_PROMPT_COLUMN,
      maxImageBytes: Math.round(env.MMBATCH_MAX_IMAGE_MB * 1024 * 1024),
      maxPromptChars: env.MMBATCH_MAX_PROMPT_CHARS,
      maxTokens: env.MMBATCH_MAX_TOKENS,
      temperature: env.MMBATCH_TEMPERATURE,
    },
  };
}

export type AppConfig = ReturnType<typeof toConfig>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return toConfig(parsed.data);
}
