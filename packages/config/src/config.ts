import { z } from 'zod';

// ============================================================================
// CONFIG SCHEMA (config.json)
// ============================================================================

export const telemetrySchema = z
  .object({
    logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
    traceErrors: z.boolean().default(false),
  })
  .strict();

export type TelemetryConfig = z.infer<typeof telemetrySchema>;

export const streamSchema = z
  .object({
    url: z.url({ protocol: /^wss?$/ }).default('wss://stream.pushbullet.com/websocket'),
    // The service sends a nop roughly every 30s; three missed ones mean the stream is dead.
    heartbeatTimeoutMs: z.number().int().min(1_000).max(600_000).default(95_000),
    connectTimeoutMs: z.number().int().min(500).max(120_000).default(15_000),
    frameQueueLimit: z.number().int().min(1).max(10_000).default(256),
  })
  .strict();

export type StreamConfig = z.infer<typeof streamSchema>;

export const backoffSchema = z
  .object({
    baseDelayMs: z.number().int().min(1).max(60_000).default(1_000),
    maxDelayMs: z.number().int().min(1).max(3_600_000).default(60_000),
    jitterRatio: z.number().min(0).max(0.5).default(0.2),
  })
  .strict()
  .refine((value) => value.maxDelayMs >= value.baseDelayMs, {
    message: 'maxDelayMs must be greater than or equal to baseDelayMs',
    path: ['maxDelayMs'],
  });

export type BackoffConfig = z.infer<typeof backoffSchema>;

export const dedupSchema = z
  .object({
    maxEntries: z.number().int().min(1).max(1_000_000).default(2_000),
    retentionMs: z.number().int().min(1_000).default(24 * 60 * 60 * 1_000),
  })
  .strict();

export type DedupConfig = z.infer<typeof dedupSchema>;

export const apiSchema = z
  .object({
    baseUrl: z.url().default('https://api.pushbullet.com/v2'),
    requestTimeoutMs: z.number().int().min(100).max(120_000).default(10_000),
    historyPageSize: z.number().int().min(1).max(500).default(20),
    historyMaxPages: z.number().int().min(1).max(50).default(5),
  })
  .strict();

export type ApiConfig = z.infer<typeof apiSchema>;

export const sinkSchema = z
  .object({
    driver: z.enum(['dbus', 'console']).default('dbus'),
    appName: z.string().trim().min(1).default('Pushbullet'),
    iconPath: z.string().trim().min(1).optional(),
    iconCacheDir: z.string().trim().min(1).default('data/icons'),
    // -1 lets the notification server decide, 0 never expires.
    expireTimeoutMs: z.number().int().min(-1).max(600_000).default(5_000),
  })
  .strict();

export type SinkConfig = z.infer<typeof sinkSchema>;

export const credentialsSchema = z
  .object({
    accessToken: z.string().min(1),
    encryptionPassword: z.string().min(1).optional(),
  })
  .strict();

export type CredentialsConfig = z.infer<typeof credentialsSchema>;

// ============================================================================
// MAIN CONFIG SCHEMAS
// ============================================================================

export const configFileSchema = z
  .object({
    $schema: z.string().optional(),
    $comment: z.string().optional(),
    telemetry: telemetrySchema.prefault({}),
    stream: streamSchema.prefault({}),
    backoff: backoffSchema.prefault({}),
    dedup: dedupSchema.prefault({}),
    api: apiSchema.prefault({}),
    sink: sinkSchema.prefault({}),
  })
  .strict();

export type ConfigFileSchema = z.infer<typeof configFileSchema>;

export const configSchema = configFileSchema
  .extend({
    credentials: credentialsSchema,
  })
  .strict();

export type ConfigSchema = z.infer<typeof configSchema>;
