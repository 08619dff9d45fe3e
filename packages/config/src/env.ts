import { z } from 'zod';

// ============================================================================
// Helpers
// ============================================================================

const optionalSecretSchema = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().optional());

// ============================================================================
// ENV SCHEMA (.env file)
// ============================================================================

export const envSchema = z
  .object({
    PUSHBULLET_ACCESS_TOKEN: z.string().trim().min(1, 'Access token is required'),
    PUSHBULLET_ENCRYPTION_PASSWORD: optionalSecretSchema,
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).optional(),
  })
  .strict();

export type EnvSchema = z.infer<typeof envSchema>;
