/**
 * Concise output
 *
 * Prints what a run does as timestamped status lines and plain text
 * blocks, and records each one in the session transcript first, so the
 * transcript holds everything the user saw.
 */

import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { ModeAdapter } from "./adapter.js";
import type { OutputSink } from "./types.js";
import type { EntryKind, TranscriptEntry } from "../transcript/index.js";

export type StatusStyle = "header" | "info" | "success" | "error";

export interface ConciseOutputOptions {
  /** Force colors on or off. Defaults to chalk's terminal detection. */
  color?: boolean;
}

/**
 * `[YYYY-MM-DDTHH:MM:SS]` for an ISO timestamp
 */
export function formatTimestamp(iso: string): string {
  return `[${iso.slice(0, 19)}]`;
}

export class ConciseOutput {
  private readonly adapter: ModeAdapter;
  private readonly sink: OutputSink;
  private readonly c: ChalkInstance;

  constructor(adapter: ModeAdapter, sink: OutputSink, options: ConciseOutputOptions = {}) {
    this.adapter = adapter;
    this.sink = sink;
    this.c = options.color === undefined ? chalk : new Chalk({ level: options.color ? 1 : 0 });
  }

  /**
   * One timestamped line. Error lines are recorded as error entries, all
   * others as system entries.
   */
  async status(message: string, style: StatusStyle = "info"): Promise<TranscriptEntry> {
    const entry = await this.adapter.append(style === "error" ? "error" : "system", message);
    this.sink.write(`${this.c.dim(formatTimestamp(entry.timestamp))} ${this.style(message, style)}\n`);
    return entry;
  }

  /**
   * Multi-line text printed as-is, recorded as one entry
   */
  async block(kind: EntryKind, text: string): Promise<TranscriptEntry> {
    const entry = await this.adapter.append(kind, text);
    const body = kind === "output" ? text : this.c.cyan(text);
    this.sink.write(body.endsWith("\n") ? body : `${body}\n`);
    return entry;
  }

  /**
   * Record an entry without printing it (input the user already sees)
   */
  record(kind: EntryKind, text: string): Promise<TranscriptEntry> {
    return this.adapter.append(kind, text);
  }

  private style(message: string, style: StatusStyle): string {
    switch (style) {
      case "header":
        return this.c.magenta.bold(message);
      case "success":
        return this.c.green(message);
      case "error":
        return this.c.red(message);
      case "info":
        return message;
    }
  }
}
