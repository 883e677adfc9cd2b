import { z } from 'zod';
import { ValidationError } from '@salesim/shared';

// Environment read by the generator and its scripts. Connection settings
// (DATABASE_URL, DB_POOL_MAX) are read by @salesim/db directly.
const runtimeConfigSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  SALES_SIM_WINDOW_DAYS: z.coerce.number().int().min(1).max(3650).default(730),
  SALES_SIM_MEDIA_ROOT: z.string().min(1).default('./media'),
  SALES_SIM_SEED: z.coerce.number().int().optional(),
  SALES_SIM_DEMO_PASSWORD: z.string().min(8).default('demo-password'),
  SALES_SIM_PASSWORD_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
});

export interface RuntimeConfig {
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  windowDays: number;
  mediaRoot: string;
  seed?: number;
  demoPassword: string;
  passwordRounds: number;
}

export function loadRuntimeConfig(
  env: Record<string, string | undefined> = process.env,
): RuntimeConfig {
  // Blank values in .env files mean "unset".
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = runtimeConfigSchema.safeParse(present);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid environment configuration',
      parsed.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }
  const cfg = parsed.data;
  return {
    logLevel: cfg.LOG_LEVEL,
    windowDays: cfg.SALES_SIM_WINDOW_DAYS,
    mediaRoot: cfg.SALES_SIM_MEDIA_ROOT,
    seed: cfg.SALES_SIM_SEED,
    demoPassword: cfg.SALES_SIM_DEMO_PASSWORD,
    passwordRounds: cfg.SALES_SIM_PASSWORD_ROUNDS,
  };
}

let _config: RuntimeConfig | null = null;

export function getRuntimeConfig(): RuntimeConfig {
  if (!_config) {
    _config = loadRuntimeConfig();
  }
  return _config;
}
