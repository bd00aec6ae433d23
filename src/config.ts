import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { LogLevel } from './logger.js';

dotenv.config();

const flag = z
  .string()
  .optional()
  .transform((v) => v === '1' || v === 'true');

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(8080),
    CRON_SCHEDULE: z.string().default('0 6 * * *'),
    DB_PATH: z.string().default('./data.sqlite'),
    ROUTES_PATH: z.string().default('./data/routes.json'),
    AIRPORTS_PATH: z.string().default('./data/airports.json'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    WORKERS: z.coerce.number().int().min(1).max(32).default(4),
    MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    CHECK_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    RETRY_DELAY_MS: z.coerce.number().int().min(0).default(10_000),
    PACING_SCOPE: z.enum(['global', 'worker']).default('global'),
    PACING_EVERY: z.coerce.number().int().min(0).default(40),
    COOL_DOWN_MS: z.coerce.number().int().min(0).default(30_000),
    CHECK_DELAY_MIN_MS: z.coerce.number().int().min(0).default(1000),
    CHECK_DELAY_MAX_MS: z.coerce.number().int().min(0).default(2000),
    CACHE_MAX_AGE_MS: z.coerce.number().int().min(0).default(3 * 60 * 60 * 1000),
    CHECKER_ENTRY_URL: z.string().url().default('https://flights.example.com/availability'),
    CHECKER_AVAILABILITY_URL: z.string().url().default('https://flights.example.com/json/availability'),
    CHECKER_LOGIN_URL: optionalString,
    CHECKER_USERNAME: optionalString,
    CHECKER_PASSWORD: optionalString,
    PW_HEADFUL: flag,
    PW_CHROMIUM_CHANNEL: optionalString,
    PW_USER_DATA_DIR: z.string().default('./pw-data'),
  })
  .refine((env) => env.CHECK_DELAY_MAX_MS >= env.CHECK_DELAY_MIN_MS, {
    message: 'CHECK_DELAY_MAX_MS must not be lower than CHECK_DELAY_MIN_MS',
    path: ['CHECK_DELAY_MAX_MS'],
  });

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;
  const logLevel: LogLevel = e.LOG_LEVEL;

  return {
    port: e.PORT,
    cron: e.CRON_SCHEDULE,
    dbPath: e.DB_PATH,
    routesPath: e.ROUTES_PATH,
    airportsPath: e.AIRPORTS_PATH,
    logLevel,
    cacheMaxAgeMs: e.CACHE_MAX_AGE_MS,
    checks: {
      workerCount: e.WORKERS,
      maxAttempts: e.MAX_ATTEMPTS,
      checkTimeoutMs: e.CHECK_TIMEOUT_MS,
      retryDelayMs: e.RETRY_DELAY_MS,
      pacing: {
        scope: e.PACING_SCOPE,
        every: e.PACING_EVERY,
        coolDownMs: e.COOL_DOWN_MS,
      },
      checkDelayMs: { min: e.CHECK_DELAY_MIN_MS, max: e.CHECK_DELAY_MAX_MS },
    },
    checker: {
      entryUrl: e.CHECKER_ENTRY_URL,
      availabilityUrl: e.CHECKER_AVAILABILITY_URL,
      loginUrl: e.CHECKER_LOGIN_URL,
      username: e.CHECKER_USERNAME,
      password: e.CHECKER_PASSWORD,
    },
    playwright: {
      headful: e.PW_HEADFUL,
      channel: e.PW_CHROMIUM_CHANNEL,
      userDataDir: e.PW_USER_DATA_DIR,
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;
