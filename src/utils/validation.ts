/**
 * Validation utilities for keel
 */

import { z } from "zod";
import { ValidationError } from "./errors.js";

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Safe validate (returns result instead of throwing)
 */
export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
): { success: true; data: T } | { success: false; issues: ValidationIssue[] } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));

  return { success: false, issues };
}

/**
 * Format issues on one line for error messages
 */
export function formatIssues(issues: ValidationIssue[]): string {
  return issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ");
}

/**
 * Session identifiers are UUIDs; anything else cannot name a session directory
 */
export const SessionIdSchema = z.string().uuid("Session id must be a UUID");

/**
 * Validate a session id supplied by a caller
 */
export function assertSessionId(value: string): string {
  const result = SessionIdSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid session id: ${value}`, { field: "sessionId" });
  }
  return result.data;
}

/**
 * Parse JSON safely
 */
export function parseJsonSafe(text: string): { ok: true; value: unknown } | { ok: false; error: Error } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }
}
