import yargs from "yargs";
import {
  DEFAULT_JOB_COMMAND,
  DEFAULT_SCHEDULER_FLAGS,
  JOB_COMMAND_ENV,
  SCHEDULER_FLAGS_ENV,
  parseTrialSubmitConfig,
} from "./config.js";
import { TrialEngine, UnsafeTrialStateError, type TrialRunReport } from "./engine.js";
import { createTrialLogger, type TrialLogger } from "./logger.js";
import { renderSummary, toRunSummary } from "./report.js";
import type { CommandRunner, TrialMode, TrialSubmitConfig } from "./types.js";

const HELP_EPILOG = `Environment variables:
  ${SCHEDULER_FLAGS_ENV}    sbatch options (default: ${DEFAULT_SCHEDULER_FLAGS})
  ${JOB_COMMAND_ENV}      job command plus options (default: ${DEFAULT_JOB_COMMAND})

Each trial directory must contain an INCAR file. Two marker files record progress:
  submitted  created when a job is submitted; removed once the trial is finished.
  finished   created on a later run once OUTCAR shows the trial completed.`;

const RESUME_HELP =
  "Resubmit trials that were submitted but never finished. DANGEROUS: make sure no job is still running in those directories.";

const SAFE_MODE_MESSAGE = `Found trials that were submitted but have not finished. Refusing to continue in safe mode.

Are jobs still running in these directories?
  If yes: use -s to skip the unfinished trials.
  If no:  use -r to resume them with new jobs.

Using -r while a job is still running may leave two jobs working in the same directory.`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export type CliOptions = {
  dirs: string[];
  mode: TrialMode;
  json: boolean;
  verbose: boolean;
};

export function modeFromFlags(flags: { resume?: boolean; skip?: boolean; check?: boolean }): TrialMode {
  if (flags.check) {
    return "check";
  }
  if (flags.resume) {
    return "resume";
  }
  if (flags.skip) {
    return "skip";
  }
  return "safe";
}

export async function parseCliArgs(argv: string[], exitProcess = true): Promise<CliOptions> {
  const parsed = await yargs(argv)
    .scriptName("trial-submit")
    .usage("$0 [options] DIR...\n\nSubmit a batch of prepared trial directories to the scheduler.")
    .parserConfiguration({ "parse-positional-numbers": false })
    .option("resume", { alias: "r", type: "boolean", describe: RESUME_HELP })
    .option("skip", {
      alias: "s",
      type: "boolean",
      describe: "Skip trials that were submitted but never finished.",
    })
    .option("check", {
      alias: "c",
      type: "boolean",
      describe: 'Only add "finished" markers; do not submit anything.',
    })
    .option("json", { type: "boolean", describe: "Print the run summary as JSON on stdout." })
    .option("verbose", { alias: "v", type: "boolean", describe: "Log scheduler command lines." })
    .conflicts("resume", ["skip", "check"])
    .conflicts("skip", "check")
    .demandCommand(1, "At least one trial directory is required")
    .strictOptions()
    .epilog(HELP_EPILOG)
    .help()
    .exitProcess(exitProcess)
    .fail((msg, err) => {
      throw new CliUsageError(msg || (err instanceof Error ? err.message : "invalid arguments"));
    })
    .parseAsync();

  return {
    dirs: parsed._.map((entry) => String(entry)),
    mode: modeFromFlags(parsed),
    json: parsed.json === true,
    verbose: parsed.verbose === true,
  };
}

export type CliDeps = {
  env?: Record<string, string | undefined>;
  runner?: CommandRunner;
  logger?: TrialLogger;
  stdout?: NodeJS.WritableStream;
  exitProcess?: boolean;
};

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let options: CliOptions;
  try {
    options = await parseCliArgs(argv, deps.exitProcess ?? true);
  } catch (err) {
    if (err instanceof CliUsageError) {
      (deps.logger ?? createTrialLogger()).error(err.message);
      return 2;
    }
    throw err;
  }

  const logger = deps.logger ?? createTrialLogger({ level: options.verbose ? "debug" : "info" });

  let config: TrialSubmitConfig;
  try {
    config = parseTrialSubmitConfig(deps.env ?? process.env);
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    return 1;
  }

  const engine = new TrialEngine({ config, logger, runner: deps.runner });
  let report: TrialRunReport;
  try {
    report = await engine.run(options.dirs, options.mode);
  } catch (err) {
    if (err instanceof UnsafeTrialStateError) {
      for (const dir of err.paths) {
        logger.info(`${dir}: unfinished, but already submitted!`);
      }
      logger.error(SAFE_MODE_MESSAGE);
      return 1;
    }
    throw err;
  }

  if (options.json) {
    (deps.stdout ?? process.stdout).write(`${JSON.stringify(toRunSummary(report), null, 2)}\n`);
  } else {
    for (const line of renderSummary(report.stats, options.mode)) {
      logger.info(line);
    }
  }
  return 0;
}
