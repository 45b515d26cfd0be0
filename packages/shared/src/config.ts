import { z } from 'zod';

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  NODE_ID: z.coerce.number().int().min(0).max(1023).default(0),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
});

// Without NATS_URL every process broadcasts to its own subscribers only.
export const NatsConfigSchema = z.object({
  NATS_URL: z.string().min(1).optional(),
});

export const AuthConfigSchema = z.object({
  ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(15 * 60),
  REFRESH_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(30 * 24 * 60 * 60),
});

export type AuthConfig = z.infer<typeof AuthConfigSchema>;

export const ApiConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(NatsConfigSchema)
  .merge(AuthConfigSchema)
  .extend({
    API_HOST: z.string().default('0.0.0.0'),
    API_PORT: z.coerce.number().default(3000),
  });

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export const GatewayConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(NatsConfigSchema)
  .merge(AuthConfigSchema)
  .extend({
    GATEWAY_HOST: z.string().default('0.0.0.0'),
    GATEWAY_PORT: z.coerce.number().default(4000),
    MAX_PAYLOAD_BYTES: z.coerce.number().default(65536),
    RATE_LIMIT_PER_SECOND: z.coerce.number().default(30),
    BACKLOG_SIZE: z.coerce.number().int().min(1).max(100).default(50),
    LOAD_MORE_SIZE: z.coerce.number().int().min(1).max(100).default(25),
  });

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

export function loadConfig<T extends z.ZodType>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
