import { z } from 'zod';
import { DEFAULT_DB_PATH } from './store/db.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  SQLITE_DB_PATH: z.string().min(1).default(DEFAULT_DB_PATH),
  LEGACY_DB_FILE: z.string().min(1).optional(),
  AUTO_LOGIN_ENABLED: booleanFlag,
  SESSION_TTL_HOURS: z.coerce.number().positive().default(12),
  REMEMBER_TTL_DAYS: z.coerce.number().positive().default(30),
});

export interface AppConfig {
  port: number;
  dbPath: string;
  legacyDbFile: string | null;
  /** Allow POST /api/auth/resume to log in the single remembered user. */
  autoLoginEnabled: boolean;
  sessionTtlSeconds: number;
  rememberTtlSeconds: number;
}

/** Reads configuration from environment variables. Throws on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    dbPath: vars.SQLITE_DB_PATH,
    legacyDbFile: vars.LEGACY_DB_FILE ?? null,
    autoLoginEnabled: vars.AUTO_LOGIN_ENABLED,
    sessionTtlSeconds: Math.round(vars.SESSION_TTL_HOURS * 60 * 60),
    rememberTtlSeconds: Math.round(vars.REMEMBER_TTL_DAYS * 24 * 60 * 60),
  };
}
