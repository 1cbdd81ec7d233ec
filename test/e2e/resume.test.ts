/**
 * End-to-end session continuity across separate runs of the commands
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, realpath, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

vi.mock("@clack/prompts", () => ({
  log: {
    info: vi.fn(),
    warning: vi.fn(),
    error: vi.fn(),
  },
}));

import { runChatCommand } from "../../src/cli/commands/chat.js";
import { runExecCommand } from "../../src/cli/commands/exec.js";
import { EXIT } from "../../src/cli/exit-codes.js";
import { decodeEchoState, encodeEchoState } from "../../src/runner/echo.js";
import { MemorySink, createTestRuntime, linesOf } from "../helpers/runtime.js";

describe("session continuity", () => {
  let base: string;
  let projectPath: string;
  let storeDir: string;

  beforeEach(async () => {
    base = await realpath(await mkdtemp(join(tmpdir(), "keel-e2e-")));
    projectPath = join(base, "project");
    storeDir = join(base, "store");
    await mkdir(join(projectPath, ".keel"), { recursive: true });
    await writeFile(
      join(projectPath, ".keel", "config.json"),
      JSON.stringify({ sessions: { storeDir: "../store", lockStaleMs: 1000, heartbeatMs: 100 } }),
    );
    vi.stubEnv("KEEL_HOME", join(base, "home"));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(base, { recursive: true, force: true });
  });

  it("should carry one session through exec, chat and exec again", async () => {
    const options = { cd: projectPath };

    expect(await runExecCommand("one", options, { stdout: new MemorySink(), color: false })).toBe(
      EXIT.SUCCESS,
    );
    expect(
      await runChatCommand(undefined, options, {
        stdout: new MemorySink(),
        input: linesOf("two", "/exit"),
        color: false,
      }),
    ).toBe(EXIT.SUCCESS);
    expect(await runExecCommand("three", options, { stdout: new MemorySink(), color: false })).toBe(
      EXIT.SUCCESS,
    );

    const { store, transcripts } = createTestRuntime(storeDir);
    const [session, ...others] = await store.listFor(projectPath);
    expect(others).toEqual([]);
    if (!session) throw new Error("expected a session");
    expect(decodeEchoState(session.snapshot)).toEqual({ prompts: ["one", "two", "three"] });

    // exec writes 8 entries, chat with one turn writes 6
    const entries = await transcripts.read(session.transcriptPath, session.id);
    expect(entries.map((e) => e.sequence)).toEqual(Array.from({ length: 22 }, (_, i) => i + 1));
  });

  it("should pick up a crashed run once its lock goes stale", async () => {
    const crashed = createTestRuntime(storeDir, { staleMs: 1000 });
    const session = await crashed.adapter.open(projectPath, { kind: "auto" });
    await crashed.adapter.append("input", "before crash");
    await crashed.adapter.save(encodeEchoState({ prompts: ["before crash"] }));
    await crashed.adapter.abandon();

    const busy = await runExecCommand("too soon", { cd: projectPath }, { stdout: new MemorySink() });
    expect(busy).toBe(EXIT.BUSY);

    await new Promise((resolve) => setTimeout(resolve, 1_200));

    const stdout = new MemorySink();
    const code = await runExecCommand("after crash", { cd: projectPath }, { stdout, color: false });

    expect(code).toBe(EXIT.SUCCESS);
    expect(stdout.lines[1]).toMatch(new RegExp(`Session ${session.id} resumed$`));

    const resumed = await crashed.store.load(session.id);
    expect(decodeEchoState(resumed.snapshot)).toEqual({ prompts: ["before crash", "after crash"] });
    const entries = await crashed.transcripts.read(resumed.transcriptPath, session.id);
    expect(entries).toHaveLength(9);
  });

  it("should report a missing session for --last in an empty project", async () => {
    const code = await runExecCommand("hello", { cd: projectPath, last: true }, { stdout: new MemorySink() });

    expect(code).toBe(EXIT.NO_SESSION);
  });
});
