/**
 * Tests for sessions command
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

import * as p from "@clack/prompts";
import { Command } from "commander";
import { registerSessionsCommand, runSessionsCommand, type SessionsReport } from "./sessions.js";
import { EXIT } from "../exit-codes.js";
import { MemorySink, createTestRuntime } from "../../../test/helpers/runtime.js";

const ANSI = /\u001b\[\d+m/g;

function isReport(value: unknown): value is SessionsReport {
  return typeof value === "object" && value !== null && "sessions" in value && "invalid" in value;
}

describe("sessions command", () => {
  let base: string;
  let projectPath: string;
  let storeDir: string;

  beforeEach(async () => {
    base = await realpath(await mkdtemp(join(tmpdir(), "keel-sessions-cmd-")));
    projectPath = join(base, "project");
    storeDir = join(base, "store");
    await mkdir(projectPath);
    vi.stubEnv("KEEL_HOME", join(base, "home"));
    vi.clearAllMocks();
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(base, { recursive: true, force: true });
  });

  it("should register the sessions command", () => {
    const program = new Command();
    registerSessionsCommand(program);

    expect(program.commands.map((c) => c.name())).toContain("sessions");
  });

  it("should report an empty project", async () => {
    const stdout = new MemorySink();

    const code = await runSessionsCommand({ cd: projectPath, sessionStore: storeDir }, { stdout });

    expect(code).toBe(EXIT.SUCCESS);
    expect(stdout.text).toBe("");
    expect(p.log.info).toHaveBeenCalledWith(`No sessions for ${projectPath}`);
  });

  it("should list sessions as JSON with their lock state", async () => {
    const runtime = createTestRuntime(storeDir);
    const idle = await runtime.store.create(projectPath);
    const live = await runtime.adapter.open(projectPath, { kind: "new" });
    const stdout = new MemorySink();

    const code = await runSessionsCommand(
      { cd: projectPath, sessionStore: storeDir, json: true },
      { stdout },
    );

    expect(code).toBe(EXIT.SUCCESS);
    const report: unknown = JSON.parse(stdout.text);
    expect(isReport(report)).toBe(true);
    if (!isReport(report)) return;
    expect(report.projectPath).toBe(projectPath);
    expect(report.storeDir).toBe(storeDir);
    expect(report.invalid).toEqual([]);
    expect(report.sessions.map((s) => ({ id: s.id, live: s.live })).sort((a, b) => a.id.localeCompare(b.id))).toEqual(
      [
        { id: idle.id, live: false },
        { id: live.id, live: true },
      ].sort((a, b) => a.id.localeCompare(b.id)),
    );

    await runtime.adapter.finish();
  });

  it("should print one line per session and warn about damaged records", async () => {
    const runtime = createTestRuntime(storeDir);
    const session = await runtime.store.create(projectPath);
    const broken = await runtime.store.create(projectPath);
    await writeFile(join(storeDir, broken.id, "session.json"), "{");
    const stdout = new MemorySink();

    const code = await runSessionsCommand({ cd: projectPath, sessionStore: storeDir }, { stdout });

    expect(code).toBe(EXIT.SUCCESS);
    expect(stdout.text.replace(ANSI, "")).toBe(
      `${session.id}  ${session.updatedAt.toISOString()}  idle  ${session.transcriptPath}\n`,
    );
    expect(p.log.warning).toHaveBeenCalledWith(
      `Skipped ${broken.id}: record is not valid JSON (truncated write?)`,
    );
  });
});
