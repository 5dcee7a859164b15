import { z } from 'zod';

const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const Config = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: LogLevel.default('info'),
  SEC_USER_AGENT: z.string().min(6).default('altman-zscore/1.0 (contact@example.com)'),
  SEC_BASE_DELAY_MS: z.coerce.number().int().min(0).default(200),
  SEC_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  SEC_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FILING_FORM: z.string().min(1).default('10-Q'),
  QUOTE_BASE_URL: z.string().url().default('https://query1.finance.yahoo.com'),
  QUOTE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000)
});
export type Config = z.infer<typeof Config>;

// Empty strings count as unset so `PORT=` in a .env file falls back to the default.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = Config.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}
