import { describe, expect, it, vi } from "vitest";
import { parseTrialSubmitConfig } from "./config.js";
import type { TrialLogger } from "./logger.js";
import { JobSubmitter } from "./submitter.js";
import type { CommandRunner } from "./types.js";

function createLogger(): TrialLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const config = parseTrialSubmitConfig({
  SUBMIT_SFLAGS: "-p small",
  SUBMIT_VASP: "vasp.slm --fast",
});

describe("job submitter", () => {
  it("runs the scheduler in the trial directory and reports the job id", async () => {
    const runner: CommandRunner = vi.fn(async () => ({
      code: 0,
      stdout: "Submitted batch job 77\n",
      stderr: "",
    }));
    const logger = createLogger();
    const submitter = new JobSubmitter({ config, logger, runner });

    const result = await submitter.submit("/trials/a");

    expect(result).toEqual({
      success: true,
      message: "Submitted batch job 77",
      stderr: "",
      jobId: "77",
    });
    expect(runner).toHaveBeenCalledWith("sbatch", ["-p", "small", "vasp.slm", "--fast"], {
      cwd: "/trials/a",
    });
    expect(logger.debug).toHaveBeenCalledWith("/trials/a: running sbatch -p small vasp.slm --fast");
  });

  it("treats output without the acknowledgement as a failure", async () => {
    const runner: CommandRunner = vi.fn(async () => ({
      code: 1,
      stdout: "",
      stderr: "sbatch: error: invalid partition specified\n",
    }));
    const submitter = new JobSubmitter({ config, logger: createLogger(), runner });

    expect(await submitter.submit("/trials/a")).toEqual({
      success: false,
      message: "",
      stderr: "sbatch: error: invalid partition specified",
    });
  });

  it("reports a scheduler that cannot be started as a failed submission", async () => {
    const runner: CommandRunner = vi.fn(async () => {
      throw new Error("spawn sbatch ENOENT");
    });
    const submitter = new JobSubmitter({ config, logger: createLogger(), runner });

    expect(await submitter.submit("/trials/a")).toEqual({
      success: false,
      message: "could not run sbatch: Error: spawn sbatch ENOENT",
      stderr: "",
    });
  });
});
