// Server configuration from environment variables

import { z } from 'zod';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    HOST: z.string().min(1).default('0.0.0.0'),
    LOG_LEVEL: LogLevelSchema.default('info'),
    SESSION_TTL_MINUTES: z.coerce.number().positive().default(60),
    MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
    GROWTH_MIN: z.coerce.number().finite().default(0),
    GROWTH_MAX: z.coerce.number().finite().default(100),
    DEFAULT_ENCODING: z.string().min(1).default('utf-8'),
  })
  .refine((env) => env.GROWTH_MIN <= env.GROWTH_MAX, {
    message: 'GROWTH_MIN must not exceed GROWTH_MAX',
    path: ['GROWTH_MIN'],
  });

/**
 * Resolved server configuration.
 */
export type ServerConfig = {
  port: number;
  host: string;
  logLevel: z.infer<typeof LogLevelSchema>;
  sessionTtlMinutes: number;
  maxUploadBytes: number;
  /** Accepted growthPercent range, inclusive */
  growthMin: number;
  growthMax: number;
  /** Encoding assumed when an upload names none */
  defaultEncoding: string;
};

/**
 * Read configuration from an environment map.
 *
 * Empty strings count as unset.
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = EnvSchema.safeParse(defined);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    sessionTtlMinutes: parsed.SESSION_TTL_MINUTES,
    maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    growthMin: parsed.GROWTH_MIN,
    growthMax: parsed.GROWTH_MAX,
    defaultEncoding: parsed.DEFAULT_ENCODING,
  };
}
