import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";
import { Value } from "@sinclair/typebox/value";
import { afterEach, describe, expect, it, vi } from "vitest";
import { modeFromFlags, parseCliArgs, runCli } from "./cli.js";
import type { TrialLogger } from "./logger.js";
import { TrialRunSummarySchema, type CommandRunner } from "./types.js";

const tmpDirs: string[] = [];

afterEach(async () => {
  await Promise.all(
    tmpDirs.splice(0).map(async (dir) => {
      await fs.rm(dir, { recursive: true, force: true });
    }),
  );
});

async function makeTrial(name: string, markers: string[] = []): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "trial-submit-cli-"));
  tmpDirs.push(root);
  const dir = path.join(root, name);
  await fs.mkdir(dir);
  await fs.writeFile(path.join(dir, "INCAR"), "ENCUT = 400\n", "utf8");
  for (const marker of markers) {
    await fs.writeFile(path.join(dir, marker), "", "utf8");
  }
  return dir;
}

function createHarness() {
  const logger: TrialLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const runner = vi.fn<CommandRunner>(async () => ({
    code: 0,
    stdout: "Submitted batch job 12345\n",
    stderr: "",
  }));
  const chunks: string[] = [];
  const stdout = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return {
    logger,
    runner,
    chunks,
    deps: { env: {}, logger, runner, stdout, exitProcess: false },
  };
}

describe("mode selection", () => {
  it("defaults to safe and maps each flag", () => {
    expect(modeFromFlags({})).toBe("safe");
    expect(modeFromFlags({ resume: true })).toBe("resume");
    expect(modeFromFlags({ skip: true })).toBe("skip");
    expect(modeFromFlags({ check: true })).toBe("check");
  });
});

describe("trial-submit cli", () => {
  it("submits and prints the text summary", async () => {
    const dir = await makeTrial("001");
    const { logger, runner, deps } = createHarness();

    const code = await runCli([dir], deps);

    expect(code).toBe(0);
    expect(runner).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith(`${dir}: submitted! (Submitted batch job 12345)`);
    expect(logger.info).toHaveBeenCalledWith("----SUMMARY----");
    expect(logger.info).toHaveBeenCalledWith("   1 jobs were submitted.");
  });

  it("keeps numeric-looking directory names as written", async () => {
    const options = await parseCliArgs(["-c", "007", "1e3"], false);

    expect(options).toEqual({ dirs: ["007", "1e3"], mode: "check", json: false, verbose: false });
  });

  it("prints a JSON summary that matches the published schema", async () => {
    const dir = await makeTrial("d1");
    const { chunks, deps } = createHarness();

    const code = await runCli(["--json", dir], deps);

    expect(code).toBe(0);
    const summary: unknown = JSON.parse(chunks.join(""));
    expect(Value.Check(TrialRunSummarySchema, summary)).toBe(true);
    expect(summary).toMatchObject({
      mode: "safe",
      stats: { all: 1, valid: 1, submitted: 1, "submitted.new": 1 },
      trials: [{ path: dir, outcome: "submitted.new", jobId: "12345" }],
    });
  });

  it("exits non-zero in safe mode when a trial is submitted but unfinished", async () => {
    const dir = await makeTrial("d1", ["submitted"]);
    const { logger, runner, deps } = createHarness();

    const code = await runCli([dir], deps);

    expect(code).toBe(1);
    expect(runner).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith(`${dir}: unfinished, but already submitted!`);
    expect(logger.error).toHaveBeenCalledWith(
      expect.stringContaining("Refusing to continue in safe mode."),
    );
  });

  it("exits zero when a submission failure leaves trials unprocessed", async () => {
    const dir = await makeTrial("d1");
    const { logger, runner, deps } = createHarness();
    runner.mockResolvedValueOnce({ code: 1, stdout: "", stderr: "sbatch: error: denied\n" });

    const code = await runCli([dir], deps);

    expect(code).toBe(0);
    expect(logger.info).toHaveBeenCalledWith(
      "   1 remain unprocessed after a failed submission. (!!!)",
    );
  });

  it("rejects conflicting mode flags", async () => {
    const dir = await makeTrial("d1");
    const { logger, runner, deps } = createHarness();

    const code = await runCli(["-r", "-s", dir], deps);

    expect(code).toBe(2);
    expect(runner).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith(expect.stringMatching(/mutually exclusive/));
  });

  it("requires at least one directory", async () => {
    const { logger, deps } = createHarness();

    expect(await runCli([], deps)).toBe(2);
    expect(logger.error).toHaveBeenCalledWith("At least one trial directory is required");
  });

  it("reports a broken environment configuration", async () => {
    const dir = await makeTrial("d1");
    const { logger, runner, deps } = createHarness();

    const code = await runCli([dir], { ...deps, env: { SUBMIT_VASP: "" } });

    expect(code).toBe(1);
    expect(runner).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith("SUBMIT_VASP must name a job command");
  });
});
