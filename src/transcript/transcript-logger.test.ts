/**
 * Tests for TranscriptLogger
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { appendFile, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TranscriptLogger } from "./transcript-logger.js";
import { encodeEntry } from "./codec.js";
import { CorruptError, KeelError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";

const SESSION = "0b7d0c4e-2f1a-4d8e-9c3b-5a6f7e8d9c0b";
const OTHER = "6c1f2b9e-8a7d-4c3b-a2e1-0f9e8d7c6b5a";

describe("TranscriptLogger", () => {
  let dir: string;
  let destination: string;
  let logger: ReturnType<typeof createLogger>;
  let transcripts: TranscriptLogger;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "keel-transcript-"));
    destination = join(dir, "transcript.jsonl");
    logger = createLogger({ level: "fatal", prettyPrint: false });
    let tick = 0;
    transcripts = new TranscriptLogger({
      logger,
      clock: () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++)),
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("open / append", () => {
    it("should number entries from 1 in a new destination", async () => {
      const handle = await transcripts.open(SESSION, destination);
      const first = await transcripts.append(handle, "input", "hello");
      const second = await transcripts.append(handle, "output", "hi there");
      await transcripts.close(handle);

      expect(first).toEqual({
        sequence: 1,
        sessionId: SESSION,
        timestamp: "2026-01-01T00:00:00.000Z",
        kind: "input",
        payload: "hello",
      });
      expect(second.sequence).toBe(2);
      expect(second.timestamp).toBe("2026-01-01T00:00:01.000Z");

      const content = await readFile(destination, "utf-8");
      expect(content).toBe(encodeEntry(first) + encodeEntry(second));
    });

    it("should create missing parent directories", async () => {
      const nested = join(dir, "a", "b", "log.jsonl");
      const handle = await transcripts.open(SESSION, nested);
      await handle.append("system", "started");
      await handle.close();

      expect(await transcripts.read(nested)).toHaveLength(1);
    });

    it("should continue numbering after reopening", async () => {
      const first = await transcripts.open(SESSION, destination);
      await first.append("input", "one");
      await first.append("output", "two");
      await first.close();

      const second = await transcripts.open(SESSION, destination);
      expect(second.lastSequence).toBe(2);
      const entry = await second.append("input", "three");
      await second.close();

      expect(entry.sequence).toBe(3);
      const entries = await transcripts.read(destination, SESSION);
      expect(entries.map((e) => e.sequence)).toEqual([1, 2, 3]);
      expect(entries.map((e) => e.payload)).toEqual(["one", "two", "three"]);
    });

    it("should number concurrent appends in call order", async () => {
      const handle = await transcripts.open(SESSION, destination);
      const results = await Promise.all(
        ["a", "b", "c", "d"].map((payload) => handle.append("output", payload)),
      );
      await handle.close();

      expect(results.map((e) => `${e.sequence}:${e.payload}`)).toEqual(["1:a", "2:b", "3:c", "4:d"]);
    });

    it("should refuse appends after close", async () => {
      const handle = await transcripts.open(SESSION, destination);
      await handle.close();

      await expect(handle.append("input", "late")).rejects.toThrow(KeelError);
      await expect(handle.append("input", "late")).rejects.toMatchObject({
        code: "TRANSCRIPT_CLOSED",
      });
      expect(handle.closed).toBe(true);
    });

    it("should allow closing twice", async () => {
      const handle = await transcripts.open(SESSION, destination);
      await handle.close();
      await expect(handle.close()).resolves.toBeUndefined();
    });
  });

  describe("crash recovery", () => {
    it("should truncate a torn final record and continue after the last complete one", async () => {
      const handle = await transcripts.open(SESSION, destination);
      await handle.append("input", "one");
      await handle.append("output", "two");
      await handle.close();
      const intactSize = (await stat(destination)).size;

      // Simulate a crash in the middle of writing record 3
      await appendFile(destination, '{"seq":3,"session":"0b7d0c4e-2f1a');
      const warn = vi.spyOn(logger, "warn");

      const reopened = await transcripts.open(SESSION, destination);
      expect(reopened.lastSequence).toBe(2);
      expect((await stat(destination)).size).toBe(intactSize);
      expect(warn).toHaveBeenCalledWith(
        `Discarded 33 bytes of incomplete transcript tail in ${destination}`,
      );

      const next = await reopened.append("input", "three");
      await reopened.close();

      expect(next.sequence).toBe(3);
      expect((await transcripts.read(destination)).map((e) => e.payload)).toEqual([
        "one",
        "two",
        "three",
      ]);
    });

    it("should reject a transcript with a gap in its numbering", async () => {
      const base = { sessionId: SESSION, timestamp: "2026-01-01T00:00:00.000Z", kind: "output" as const };
      await writeFile(
        destination,
        encodeEntry({ ...base, sequence: 1, payload: "one" }) +
          encodeEntry({ ...base, sequence: 3, payload: "three" }),
      );

      await expect(transcripts.open(SESSION, destination)).rejects.toThrow(CorruptError);
    });

    it("should reject a destination written by another session", async () => {
      const other = await transcripts.open(OTHER, destination);
      await other.append("input", "not yours");
      await other.close();

      await expect(transcripts.open(SESSION, destination)).rejects.toMatchObject({
        name: "CorruptError",
        reason: `record 1 belongs to session ${OTHER}, expected ${SESSION}`,
      });
    });
  });

  describe("read / lastSequence", () => {
    it("should read a missing destination as empty", async () => {
      expect(await transcripts.read(join(dir, "missing.jsonl"))).toEqual([]);
      expect(await transcripts.lastSequence(join(dir, "missing.jsonl"))).toBe(0);
    });

    it("should ignore a torn tail without modifying the file", async () => {
      const handle = await transcripts.open(SESSION, destination);
      await handle.append("input", "one");
      await handle.close();
      await appendFile(destination, '{"seq":2');
      const sizeBefore = (await stat(destination)).size;

      expect(await transcripts.lastSequence(destination, SESSION)).toBe(1);
      expect((await stat(destination)).size).toBe(sizeBefore);
    });
  });
});
