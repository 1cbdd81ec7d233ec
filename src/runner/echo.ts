/**
 * Built-in turn handler: echoes each prompt back and keeps every prompt
 * of the session in its snapshot.
 */

import { z } from "zod";
import type { TurnHandler } from "./types.js";
import { parseJsonSafe } from "../utils/validation.js";

const EchoStateSchema = z.object({
  prompts: z.array(z.string()),
});

export type EchoState = z.infer<typeof EchoStateSchema>;

/**
 * Decode an echo snapshot. An empty or unrecognised snapshot starts over.
 */
export function decodeEchoState(snapshot: Buffer): EchoState {
  if (snapshot.length === 0) return { prompts: [] };
  const json = parseJsonSafe(snapshot.toString("utf-8"));
  if (!json.ok) return { prompts: [] };
  const parsed = EchoStateSchema.safeParse(json.value);
  return parsed.success ? parsed.data : { prompts: [] };
}

export function encodeEchoState(state: EchoState): Buffer {
  return Buffer.from(JSON.stringify(state), "utf-8");
}

export function createEchoHandler(): TurnHandler {
  return async ({ prompt, snapshot }) => {
    const state = decodeEchoState(snapshot);
    const next: EchoState = { prompts: [...state.prompts, prompt] };
    return {
      events: [{ kind: "output", message: prompt }],
      snapshot: encodeEchoState(next),
    };
  };
}
