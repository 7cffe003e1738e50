import { defaultCommandRunner, describeError } from "./exec.js";
import type { TrialLogger } from "./logger.js";
import { formatCommandLine } from "./shell.js";
import { isAcknowledged, parseSubmittedJobId } from "./slurm.js";
import type { CommandRunner, SubmitResult, TrialSubmitConfig } from "./types.js";

export type JobSubmitterParams = {
  config: Pick<
    TrialSubmitConfig,
    "schedulerCommand" | "schedulerFlags" | "jobCommand" | "acknowledgement"
  >;
  logger: TrialLogger;
  runner?: CommandRunner;
};

export class JobSubmitter {
  private readonly config: JobSubmitterParams["config"];
  private readonly logger: TrialLogger;
  private readonly runner: CommandRunner;

  constructor(params: JobSubmitterParams) {
    this.config = params.config;
    this.logger = params.logger;
    this.runner = params.runner ?? defaultCommandRunner;
  }

  submitArgs(): string[] {
    return [...this.config.schedulerFlags, ...this.config.jobCommand];
  }

  async submit(trialDir: string): Promise<SubmitResult> {
    const command = this.config.schedulerCommand;
    const args = this.submitArgs();
    this.logger.debug(`${trialDir}: running ${formatCommandLine(command, args)}`);

    let stdout: string;
    let stderr: string;
    try {
      const result = await this.runner(command, args, { cwd: trialDir });
      stdout = result.stdout.trim();
      stderr = result.stderr.trim();
    } catch (err) {
      return {
        success: false,
        message: `could not run ${command}: ${describeError(err)}`,
        stderr: "",
      };
    }

    if (!isAcknowledged(stdout, this.config.acknowledgement)) {
      return { success: false, message: stdout, stderr };
    }
    return { success: true, message: stdout, stderr, jobId: parseSubmittedJobId(stdout) };
  }
}
