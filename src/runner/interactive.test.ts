/**
 * Tests for the interactive runner
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, realpath, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { runInteractive } from "./interactive.js";
import { runExec } from "./exec.js";
import { createEchoHandler, decodeEchoState } from "./echo.js";
import type { TurnHandler } from "./types.js";
import {
  MemorySink,
  createTestRuntime,
  idleInput,
  linesOf,
  type TestRuntime,
} from "../../test/helpers/runtime.js";

const TS = String.raw`\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\]`;

describe("runInteractive", () => {
  let base: string;
  let rootDir: string;
  let projectPath: string;

  function spawn(): TestRuntime {
    return createTestRuntime(rootDir);
  }

  beforeEach(async () => {
    base = await realpath(await mkdtemp(join(tmpdir(), "keel-interactive-")));
    rootDir = join(base, "store");
    projectPath = join(base, "project");
    await mkdir(projectPath);
  });

  afterEach(async () => {
    await rm(base, { recursive: true, force: true });
  });

  it("should run one turn per line until /exit", async () => {
    const runtime = spawn();
    const sink = new MemorySink();

    const summary = await runInteractive({
      adapter: runtime.adapter,
      projectPath,
      mode: { kind: "auto" },
      handler: createEchoHandler(),
      input: linesOf("first", "", "  second  ", "/exit", "never read"),
      output: sink,
      color: false,
      logger: runtime.logger,
    });

    expect(summary.turns).toBe(2);
    expect(decodeEchoState(summary.session.snapshot)).toEqual({ prompts: ["first", "second"] });
    expect(sink.lines).toHaveLength(6);
    expect(sink.lines[0]).toMatch(new RegExp(`^${TS} keel \\(v[^)]+\\) interactive session$`));
    expect(sink.lines.slice(3, 5)).toEqual(["first", "second"]);
    expect(sink.lines[5]).toMatch(new RegExp(`^${TS} Session saved$`));

    const entries = await runtime.transcripts.read(summary.session.transcriptPath);
    expect(entries.map((e) => `${e.kind}:${e.payload}`).slice(3)).toEqual([
      "input:first",
      "output:first",
      "input:second",
      "output:second",
      "system:Session saved",
    ]);
    expect(summary.lastSequence).toBe(8);
  });

  it("should end the session at end of input", async () => {
    const runtime = spawn();

    const summary = await runInteractive({
      adapter: runtime.adapter,
      projectPath,
      mode: { kind: "auto" },
      handler: createEchoHandler(),
      input: linesOf("only"),
      output: new MemorySink(),
      color: false,
      logger: runtime.logger,
    });

    expect(summary.turns).toBe(1);
    expect(runtime.adapter.phase).toBe("saved");
    expect(await runtime.locks.isLive(summary.session.id)).toBe(false);
  });

  it("should run an initial prompt before reading input", async () => {
    const runtime = spawn();
    const sink = new MemorySink();

    const summary = await runInteractive({
      adapter: runtime.adapter,
      projectPath,
      mode: { kind: "auto" },
      handler: createEchoHandler(),
      input: linesOf("/quit"),
      output: sink,
      initialPrompt: "kick off",
      color: false,
      logger: runtime.logger,
    });

    expect(summary.turns).toBe(1);
    expect(sink.lines[3]).toMatch(new RegExp(`^${TS} Prompt:$`));
    expect(sink.lines.slice(4, 6)).toEqual(["kick off", "kick off"]);
  });

  it("should keep going after a failing turn and keep the previous snapshot", async () => {
    const runtime = spawn();
    const sink = new MemorySink();
    const echo = createEchoHandler();
    const handler: TurnHandler = async (context) => {
      if (context.prompt === "bad") throw new Error("cannot handle bad");
      return echo(context);
    };

    const summary = await runInteractive({
      adapter: runtime.adapter,
      projectPath,
      mode: { kind: "auto" },
      handler,
      input: linesOf("good", "bad", "better"),
      output: sink,
      color: false,
      logger: runtime.logger,
    });

    expect(summary.turns).toBe(3);
    expect(decodeEchoState(summary.session.snapshot)).toEqual({ prompts: ["good", "better"] });
    expect(sink.lines[4]).toMatch(new RegExp(`^${TS} Error: cannot handle bad$`));
  });

  it("should pass turn numbers and the running snapshot to the handler", async () => {
    const runtime = spawn();
    const seen: Array<{ turn: number; snapshot: string }> = [];
    const handler: TurnHandler = async ({ turn, snapshot }) => {
      seen.push({ turn, snapshot: snapshot.toString() });
      return { events: [], snapshot: Buffer.from(`after ${turn}`) };
    };

    await runInteractive({
      adapter: runtime.adapter,
      projectPath,
      mode: { kind: "auto" },
      handler,
      input: linesOf("a", "b"),
      output: new MemorySink(),
      color: false,
      logger: runtime.logger,
    });

    expect(seen).toEqual([
      { turn: 1, snapshot: "" },
      { turn: 2, snapshot: "after 1" },
    ]);
  });

  it("should save and release the session when aborted while waiting for input", async () => {
    const runtime = spawn();
    const sink = new MemorySink();
    const controller = new AbortController();
    const { input, waiting } = idleInput();

    const run = runInteractive({
      adapter: runtime.adapter,
      projectPath,
      mode: { kind: "auto" },
      handler: createEchoHandler(),
      input,
      output: sink,
      initialPrompt: "before signal",
      color: false,
      logger: runtime.logger,
      signal: controller.signal,
    });
    await waiting;
    controller.abort("SIGINT");
    const summary = await run;

    expect(summary).toMatchObject({ interrupted: true, turns: 1 });
    expect(sink.lines.at(-2)).toMatch(new RegExp(`^${TS} Interrupted by SIGINT$`));
    expect(sink.lines.at(-1)).toMatch(new RegExp(`^${TS} Session saved$`));
    expect(runtime.adapter.phase).toBe("saved");
    expect(await runtime.locks.isLive(summary.session.id)).toBe(false);
    expect(decodeEchoState(summary.session.snapshot)).toEqual({ prompts: ["before signal"] });
  });

  it("should stop after the turn in progress when aborted during it", async () => {
    const runtime = spawn();
    const controller = new AbortController();
    const echo = createEchoHandler();
    const handler: TurnHandler = async (context) => {
      controller.abort("SIGTERM");
      return echo(context);
    };

    const summary = await runInteractive({
      adapter: runtime.adapter,
      projectPath,
      mode: { kind: "auto" },
      handler,
      input: linesOf("first", "second"),
      output: new MemorySink(),
      color: false,
      logger: runtime.logger,
      signal: controller.signal,
    });

    expect(summary).toMatchObject({ interrupted: true, turns: 1 });
    expect(decodeEchoState(summary.session.snapshot)).toEqual({ prompts: ["first"] });
  });

  it("should resume a session started in exec mode", async () => {
    const first = spawn();
    const execSummary = await runExec({
      adapter: first.adapter,
      projectPath,
      mode: { kind: "auto" },
      prompt: "from exec",
      handler: createEchoHandler(),
      output: new MemorySink(),
      color: false,
      logger: first.logger,
    });

    const second = spawn();
    const summary = await runInteractive({
      adapter: second.adapter,
      projectPath,
      mode: { kind: "auto" },
      handler: createEchoHandler(),
      input: linesOf("from chat"),
      output: new MemorySink(),
      color: false,
      logger: second.logger,
    });

    expect(summary.resumed).toBe(true);
    expect(summary.session.id).toBe(execSummary.session.id);
    expect(summary.firstSequence).toBe(execSummary.lastSequence + 1);
    expect(decodeEchoState(summary.session.snapshot)).toEqual({
      prompts: ["from exec", "from chat"],
    });
  });
});
