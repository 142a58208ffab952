import { z } from 'zod';
import type { ChainfeedConfig } from './types.ts';

// ============================================================================
// Chain Configuration Schema
// ============================================================================

const chainConfigSchema = z.object({
  id: z.number().positive().int(),
  rpcUrl: z.string().url(),
  timeout: z.number().positive().int().optional(),
  retryCount: z.number().nonnegative().int().max(10).optional(),
});

// ============================================================================
// Contract Configuration Schema
// ============================================================================

const addressSchema = z.custom<`0x${string}`>(
  (val) => typeof val === 'string' && /^0x[a-fA-F0-9]{40}$/.test(val),
  { message: 'Invalid Ethereum address' }
);

const contractsConfigSchema = z.object({
  agentRegistry: addressSchema,
  scannerRegistry: addressSchema,
  dispatch: addressSchema,
});

// ============================================================================
// Feed Configuration Schema
// ============================================================================

const feedConfigSchema = z.object({
  startBlock: z.number().nonnegative().int().optional(),
  blockOffset: z.number().nonnegative().int().max(256).optional(),
  /** Seconds */
  maxBlockAge: z.number().positive().optional(),
  /** Milliseconds */
  pollingInterval: z.number().nonnegative().int().optional(),
  cacheSize: z.number().positive().int().optional(),
}).strict();

// ============================================================================
// Logging Configuration Schema
// ============================================================================

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'trace']);

const loggingConfigSchema = z.object({
  level: logLevelSchema,
  timestamps: z.boolean().optional(),
  json: z.boolean().optional(),
});

// ============================================================================
// Health Configuration Schema
// ============================================================================

const healthConfigSchema = z.object({
  enabled: z.boolean().optional(),
  host: z.string().min(1).optional(),
  port: z.number().positive().int().max(65535).optional(),
});

// ============================================================================
// Main Configuration Schema
// ============================================================================

export const chainfeedConfigSchema: z.ZodType<ChainfeedConfig, z.ZodTypeDef, unknown> = z
  .object({
    chain: chainConfigSchema,
    contracts: contractsConfigSchema,
    feed: feedConfigSchema.optional(),
    logging: loggingConfigSchema.optional(),
    health: healthConfigSchema.optional(),
  })
  .superRefine((config, ctx) => {
    // Logs are routed by emitting address, so each role needs its own contract
    const seen = new Map<string, string>();
    for (const [role, address] of Object.entries(config.contracts)) {
      const key = address.toLowerCase();
      const other = seen.get(key);
      if (other) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Contract "${role}" has the same address as "${other}"`,
          path: ['contracts', role],
        });
      }
      seen.set(key, role);
    }
  });

// Export individual schemas for reuse
export {
  addressSchema,
  chainConfigSchema,
  contractsConfigSchema,
  feedConfigSchema,
  healthConfigSchema,
  loggingConfigSchema,
  logLevelSchema,
};
