import { z } from 'zod';

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const withDefault = (fallback: string) => z.preprocess(blankToUndefined, z.string().trim().default(fallback));

const logLevelSchema = z.preprocess(
  blankToUndefined,
  z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
);

export type LogLevel = z.infer<typeof logLevelSchema>;

export function resolveLogLevel(value: string | undefined): LogLevel {
  return logLevelSchema.parse(value);
}

const envSchema = z.object({
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(9000)),
  HOST: withDefault('0.0.0.0'),
  LOG_LEVEL: logLevelSchema,
  DATA_DIR: withDefault('data'),
  DEFAULT_AI_PROVIDER: withDefault('claude'),

  ANTHROPIC_API_KEY: z.string().default(''),
  OPENAI_API_KEY: z.string().default(''),
  GOOGLE_API_KEY: z.string().default(''),
  MOONSHOT_API_KEY: z.string().default(''),
  PERPLEXITY_API_KEY: z.string().default(''),

  CLAUDE_MODEL: withDefault('claude-sonnet-4-20250514'),
  OPENAI_MODEL: withDefault('gpt-4o'),
  GEMINI_PRO_MODEL: withDefault('gemini-1.5-pro'),
  GEMINI_FLASH_MODEL: withDefault('gemini-2.0-flash-exp'),
  MOONSHOT_MODEL: withDefault('kimi-k2-0905-preview'),
  PERPLEXITY_MODEL: withDefault('llama-3.1-sonar-large-128k-online'),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}
