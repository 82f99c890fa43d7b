// src/config/ConfigValidator.ts

import { z } from 'zod';

// Retry Configuration Schema
const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).max(10),
    baseDelay: z.number().positive(),
    maxDelay: z.number().positive(),
    retryableStatusCodes: z.array(z.number().int().min(100).max(599)),
  })
  .refine((data) => data.maxDelay >= data.baseDelay, {
    message: 'maxDelay must be greater than or equal to baseDelay',
  });

// Per-account throttle
const RateLimitConfigSchema = z.object({
  qps: z.number().positive(),
  concurrency: z.number().int().positive(),
});

// Reddit asks for "<platform>:<app ID>:<version string>"
const UserAgentSchema = z
  .string()
  .regex(/^[^:\s]+:[^:\s]+:[^:\s]+/, "User agent must look like '<platform>:<app id>:<version>'");

const EncryptionKeySchema = z
  .string()
  .length(64, 'Encryption key must be exactly 64 characters')
  .regex(/^[0-9a-f]{64}$/i, 'Encryption key must be a valid 32-byte hexadecimal string (0-9, a-f)');

const CredentialStoreConfigSchema = z
  .object({
    // redis://, postgres:// or postgresql://; in-memory when omitted
    uri: z.string().url().optional(),
    encryption: z
      .object({
        key: EncryptionKeySchema,
        previousKeys: z.array(EncryptionKeySchema).optional(),
        algorithm: z.literal('aes-256-gcm'),
      })
      .optional(),
  })
  .optional();

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
    silent: z.boolean().optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .optional();

// Complete Init Configuration Schema
export const InitConfigSchema = z.object({
  http: z.object({
    timeout: z.number().positive().optional(),
    retry: RetryConfigSchema,
    userAgent: UserAgentSchema.optional(),
  }),
  rateLimit: RateLimitConfigSchema.optional(),
  auth: z
    .object({
      tokenEndpoint: z.string().url().optional(),
    })
    .optional(),
  credentialStore: CredentialStoreConfigSchema,
  metrics: MetricsConfigSchema,
  logging: LoggerConfigSchema,
});

export type InitConfig = z.infer<typeof InitConfigSchema>;

/**
 * Validate SDK initialization configuration
 *
 * @returns Validated configuration
 * @throws {z.ZodError} If configuration is invalid with detailed error messages
 */
export function validateConfig(config: unknown): InitConfig {
  return InitConfigSchema.parse(config);
}

export type ConfigValidationResult =
  | { success: true; data: InitConfig }
  | { success: false; errors: string[] };

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(config: unknown): ConfigValidationResult {
  const result = InitConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
