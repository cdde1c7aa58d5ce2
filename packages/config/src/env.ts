import { LOG_LEVEL_NAMES, createLogger } from '@wayfarer/logger';
import { z } from 'zod';

const requiredString = (name: string) => z.string().min(1, `${name} must be set`);

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  GOOGLE_MAPS_API_KEY: requiredString('GOOGLE_MAPS_API_KEY'),
  GOOGLE_MAPS_TIMEOUT_MS: z.coerce
    .number({ invalid_type_error: 'GOOGLE_MAPS_TIMEOUT_MS must be a number' })
    .int()
    .positive()
    .optional(),
  LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).optional()
});

export type Env = z.infer<typeof EnvSchema>;

const log = createLogger('config');

export function loadEnv(raw: Record<string, string | undefined> = process.env): Env {
  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    log.error({ fieldErrors: parsed.error.flatten().fieldErrors }, 'Invalid environment variables');
    throw new Error('Environment validation failed');
  }
  return parsed.data;
}
