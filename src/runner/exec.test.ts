/**
 * Tests for the non-interactive runner
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, realpath, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { runExec } from "./exec.js";
import { createEchoHandler, decodeEchoState } from "./echo.js";
import type { TurnHandler } from "./types.js";
import { MemorySink, createTestRuntime, type TestRuntime } from "../../test/helpers/runtime.js";
import { BusyError, ValidationError } from "../utils/errors.js";

const TS = String.raw`\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\]`;

describe("runExec", () => {
  let base: string;
  let rootDir: string;
  let projectPath: string;

  function spawn(): TestRuntime {
    return createTestRuntime(rootDir);
  }

  async function exec(runtime: TestRuntime, prompt: string, handler: TurnHandler = createEchoHandler()) {
    const sink = new MemorySink();
    const summary = await runExec({
      adapter: runtime.adapter,
      projectPath,
      mode: { kind: "auto" },
      prompt,
      handler,
      output: sink,
      color: false,
      logger: runtime.logger,
    });
    return { summary, sink };
  }

  beforeEach(async () => {
    base = await realpath(await mkdtemp(join(tmpdir(), "keel-exec-")));
    rootDir = join(base, "store");
    projectPath = join(base, "project");
    await mkdir(projectPath);
  });

  afterEach(async () => {
    await rm(base, { recursive: true, force: true });
  });

  it("should print the banner, prompt and result as concise lines", async () => {
    const { summary, sink } = await exec(spawn(), "hello world");
    const id = summary.session.id;

    expect(sink.lines).toHaveLength(8);
    expect(sink.lines[0]).toMatch(new RegExp(`^${TS} keel \\(v\\d+\\.\\d+\\.\\d+\\) non-interactive session$`));
    expect(sink.lines[1]).toMatch(new RegExp(`^${TS} Session ${id} created$`));
    expect(sink.lines[2]).toMatch(new RegExp(`^${TS} Working directory: `));
    expect(sink.lines[2]?.endsWith(projectPath)).toBe(true);
    expect(sink.lines[3]).toMatch(new RegExp(`^${TS} Prompt:$`));
    expect(sink.lines[4]).toBe("hello world");
    expect(sink.lines[5]).toMatch(new RegExp(`^${TS} Final result:$`));
    expect(sink.lines[6]).toBe("hello world");
    expect(sink.lines[7]).toMatch(new RegExp(`^${TS} Task complete$`));
  });

  it("should record every printed step in the transcript", async () => {
    const runtime = spawn();
    const { summary } = await exec(runtime, "hello world");

    const entries = await runtime.transcripts.read(summary.session.transcriptPath, summary.session.id);

    expect(entries.map((e) => e.kind)).toEqual([
      "system",
      "system",
      "system",
      "system",
      "input",
      "system",
      "output",
      "system",
    ]);
    expect(entries.map((e) => e.payload).slice(3)).toEqual([
      "Prompt:",
      "hello world",
      "Final result:",
      "hello world",
      "Task complete",
    ]);
    expect(summary).toMatchObject({ resumed: false, firstSequence: 1, lastSequence: 8, turns: 1 });
  });

  it("should continue the same session on the next run", async () => {
    const first = await exec(spawn(), "one");
    const second = await exec(spawn(), "two");

    expect(second.summary.session.id).toBe(first.summary.session.id);
    expect(second.summary).toMatchObject({ resumed: true, firstSequence: 9, lastSequence: 16 });
    expect(second.sink.lines[1]).toMatch(new RegExp(`^${TS} Session ${first.summary.session.id} resumed$`));
    expect(decodeEchoState(second.summary.session.snapshot)).toEqual({ prompts: ["one", "two"] });
  });

  it("should head only the last output of the turn as the final result", async () => {
    const handler: TurnHandler = async ({ snapshot }) => ({
      events: [
        { kind: "output", message: "draft" },
        { kind: "system", message: "Refining" },
        { kind: "output", message: "answer" },
      ],
      snapshot,
    });

    const { sink } = await exec(spawn(), "question", handler);

    expect(sink.lines.slice(5, 9).map((line) => line.replace(new RegExp(`^${TS} `), ""))).toEqual([
      "draft",
      "Refining",
      "Final result:",
      "answer",
    ]);
  });

  it("should record a failing turn, save, release the lock and rethrow", async () => {
    const runtime = spawn();
    const failing: TurnHandler = async () => {
      throw new Error("handler exploded");
    };

    const sink = new MemorySink();
    await expect(
      runExec({
        adapter: runtime.adapter,
        projectPath,
        mode: { kind: "auto" },
        prompt: "do it",
        handler: failing,
        output: sink,
        color: false,
        logger: runtime.logger,
      }),
    ).rejects.toThrow("handler exploded");

    expect(sink.lines.at(-1)).toMatch(new RegExp(`^${TS} Error: handler exploded$`));
    expect(runtime.adapter.phase).toBe("saved");

    const [session] = await runtime.store.listFor(projectPath);
    expect(session).toBeDefined();
    if (!session) return;
    expect(await runtime.locks.isLive(session.id)).toBe(false);
    expect(session.updatedAt.getTime()).toBeGreaterThan(session.createdAt.getTime());

    const entries = await runtime.transcripts.read(session.transcriptPath);
    expect(entries.at(-1)).toMatchObject({ sequence: 6, kind: "error", payload: "Error: handler exploded" });
  });

  it("should reject an empty prompt before touching the store", async () => {
    const runtime = spawn();

    await expect(exec(runtime, "   ")).rejects.toThrow(ValidationError);
    expect(await runtime.store.listFor(projectPath)).toEqual([]);
  });

  it("should fail with Busy while another run holds the session", async () => {
    const holder = spawn();
    await holder.adapter.open(projectPath, { kind: "auto" });

    const contender = spawn();
    const sink = new MemorySink();
    await expect(
      runExec({
        adapter: contender.adapter,
        projectPath,
        mode: { kind: "auto" },
        prompt: "hello",
        handler: createEchoHandler(),
        output: sink,
        color: false,
        logger: contender.logger,
      }),
    ).rejects.toThrow(BusyError);

    expect(sink.text).toBe("");
    await holder.adapter.finish();
  });
});
