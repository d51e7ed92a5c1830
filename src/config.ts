import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const ConfigSchema = z.object({
  OPENAI_API_KEY: z.string().trim().optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  MAX_AI_CHARS: positiveInt(15_000),
  AI_RETRIES: positiveInt(2),
  REQUEST_TIMEOUT_MS: positiveInt(30_000),
  REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(800),
  PDF_MAX_BYTES: positiveInt(16 * 1024 * 1024),
  PDF_MAX_CHARS: positiveInt(60_000),
  MAX_CANDIDATES: positiveInt(80),
  DATE_WINDOW_PAST_DAYS: z.coerce.number().int().min(0).default(90),
  DATE_WINDOW_FUTURE_DAYS: z.coerce.number().int().min(0).default(720),
  SOURCES_FILE: z.string().min(1).default('sources.json'),
  OUTPUT_FILE: z.string().min(1).default('data.json'),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Reads configuration from the environment. Empty values count as unset so a
 * copied .env.example does not override the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const parsed = ConfigSchema.safeParse(present);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  ${issues.join('\n  ')}`);
  }

  return parsed.data;
}
