/**
 * Configuration schema for keel
 */

import { z } from "zod";
import { LOG_LEVELS } from "../utils/logger.js";

/**
 * Session persistence configuration schema
 */
export const SessionsConfigSchema = z
  .object({
    storeDir: z.string().min(1).optional(),
    lockStaleMs: z.number().int().min(1000).default(30000),
    heartbeatMs: z.number().int().min(100).default(10000),
  })
  .refine((value) => value.heartbeatMs < value.lockStaleMs, {
    message: "heartbeatMs must be lower than lockStaleMs",
    path: ["heartbeatMs"],
  });

export type SessionsConfig = z.infer<typeof SessionsConfigSchema>;

/**
 * Logging configuration schema
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default("warn"),
  logToFile: z.boolean().default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Complete configuration schema
 */
export const KeelConfigSchema = z.object({
  sessions: SessionsConfigSchema.default({ lockStaleMs: 30000, heartbeatMs: 10000 }),
  logging: LoggingConfigSchema.default({ level: "warn", logToFile: false }),
});

export type KeelConfig = z.infer<typeof KeelConfigSchema>;

/**
 * Create default configuration
 */
export function createDefaultConfig(): KeelConfig {
  return {
    sessions: {
      lockStaleMs: 30000,
      heartbeatMs: 10000,
    },
    logging: {
      level: "warn",
      logToFile: false,
    },
  };
}
