import { z } from 'zod';

// ============================================================================
// Helpers
// ============================================================================

const optionalUrlSchema = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().url().optional());

// ============================================================================
// ENV SCHEMA (.env file)
// ============================================================================

export const envSchema = z
  .object({
    RPC_HTTP_ENDPOINT: z.string().trim().url(),
    DISCORD_WEBHOOK_URL: optionalUrlSchema,
  })
  .strict();

export type EnvSchema = z.infer<typeof envSchema>;
