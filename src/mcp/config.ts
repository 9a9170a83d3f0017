/**
 * Bridge configuration schema.
 *
 * Every field has a default, so `{ subprocess: { command } }` is a complete
 * configuration. Loading and layering live in cli/config-manager.ts.
 */

import { z } from "zod";

/** Largest delay setTimeout honours; longer ones fire after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

const milliseconds = () => z.number().int().max(MAX_TIMER_MS, `Must be at most ${MAX_TIMER_MS} ms`);

export const restartPolicySchema = z
  .object({
    maxRestarts: z.number().int().min(0).default(5),
    windowMs: milliseconds().positive().default(60_000),
    baseDelayMs: milliseconds().min(0).default(1_000),
    maxDelayMs: milliseconds().min(0).default(30_000),
    jitterMs: milliseconds().min(0).default(1_000),
  })
  .strict();

export const shutdownPolicySchema = z
  .object({
    gracePeriodMs: milliseconds().min(0).default(5_000),
    killTimeoutMs: milliseconds().min(0).default(2_000),
  })
  .strict();

export const subprocessSchema = z
  .object({
    command: z.string().min(1, "A tool server command is required"),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).default({}),
    cwd: z.string().optional(),
  })
  .strict();

export const httpSchema = z
  .object({
    bodyLimitBytes: z.number().int().positive().default(1024 * 1024),
    cors: z.boolean().default(true),
    corsOrigins: z.array(z.string().min(1)).default(["*"]),
  })
  .strict();

export const logSchema = z
  .object({
    level: z.enum(["error", "warn", "info", "debug"]).optional(),
    format: z.enum(["text", "json"]).default("text"),
  })
  .strict();

export const bridgeConfigSchema = z
  .object({
    host: z.string().min(1).default("0.0.0.0"),
    port: z.number().int().min(0).max(65_535).default(8000),
    callTimeoutMs: milliseconds().positive().default(30_000),
    subprocess: subprocessSchema,
    restart: restartPolicySchema.default({}),
    shutdown: shutdownPolicySchema.default({}),
    http: httpSchema.default({}),
    terminatedExitDelayMs: milliseconds().min(0).default(5_000),
    log: logSchema.default({}),
  })
  .strict();

export type BridgeConfig = z.infer<typeof bridgeConfigSchema>;

/** Shape accepted before defaults are applied (config file, env and flag layers). */
export type BridgeConfigInput = z.input<typeof bridgeConfigSchema>;
