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

const isoDateSchema = z
  .string()
  .trim()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Must be an ISO-8601 date' });

// ============================================================================
// CONFIG SCHEMA (config.json)
// ============================================================================

const telemetryFileSchema = z
  .object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
    traceErrors: z.boolean().default(false),
  })
  .strict();

export const telemetrySchema = telemetryFileSchema.extend({
  discordWebhookUrl: optionalUrlSchema,
});

export type TelemetryConfig = z.infer<typeof telemetrySchema>;

const rpcFileSchema = z
  .object({
    commitment: z.enum(['processed', 'confirmed', 'finalized']).default('processed'),
    timeoutMs: z.number().int().min(100).max(60_000).default(5_000),
  })
  .strict();

export const rpcSchema = rpcFileSchema.extend({
  httpEndpoint: z.string().trim().url(),
});

export type RpcConfig = z.infer<typeof rpcSchema>;

export const eraSpecSchema = z
  .object({
    epochSize: z.number().int().positive(),
    slotLengthMs: z.number().positive(),
    endEpoch: z.number().int().positive().optional(),
  })
  .strict();

export type EraSpecConfig = z.infer<typeof eraSpecSchema>;

const erasSchema = z
  .array(eraSpecSchema)
  .min(1)
  .superRefine((eras, ctx) => {
    let previousEnd = 0;
    eras.forEach((era, index) => {
      const isLast = index === eras.length - 1;
      if (era.endEpoch === undefined) {
        if (!isLast) {
          ctx.addIssue({ code: 'custom', path: [index, 'endEpoch'], message: 'Only the last era may be open-ended' });
        }
        return;
      }
      if (era.endEpoch <= previousEnd) {
        ctx.addIssue({
          code: 'custom',
          path: [index, 'endEpoch'],
          message: `Era must end after epoch ${previousEnd}`,
        });
      }
      previousEnd = era.endEpoch;
    });
  });

export const rpcHistorySchema = z
  .object({
    source: z.literal('rpc'),
    slotLengthMs: z.number().positive().default(400),
    refreshIntervalMs: z.number().int().min(1_000).default(3_600_000),
  })
  .strict();

export const staticHistorySchema = z
  .object({
    source: z.literal('static'),
    eras: erasSchema,
  })
  .strict();

export const historySchema = z.discriminatedUnion('source', [rpcHistorySchema, staticHistorySchema]);

export type HistoryConfig = z.infer<typeof historySchema>;

export const chainSchema = z
  .object({
    startTime: isoDateSchema,
    history: historySchema,
  })
  .strict();

export type ChainConfig = z.infer<typeof chainSchema>;

export const syncSchema = z
  .object({
    toleranceSeconds: z.number().min(0).max(86_400).default(300),
    pollIntervalMs: z.number().int().min(500).max(3_600_000).default(10_000),
    notifyOnProgressStep: z.number().min(0).max(1).default(0.1),
  })
  .strict();

export type SyncConfig = z.infer<typeof syncSchema>;

// ============================================================================
// MAIN CONFIG SCHEMAS
// ============================================================================

export const configFileSchema = z
  .object({
    $schema: z.string().optional(),
    $comment: z.string().optional(),
    telemetry: telemetryFileSchema.default({}),
    rpc: rpcFileSchema.default({}),
    chain: chainSchema,
    sync: syncSchema.default({}),
  })
  .strict();

export type ConfigFileSchema = z.infer<typeof configFileSchema>;

export const configSchema = configFileSchema
  .extend({
    telemetry: telemetrySchema,
    rpc: rpcSchema,
  })
  .strict();

export type ConfigSchema = z.infer<typeof configSchema>;
