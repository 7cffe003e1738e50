export { parseCliArgs, runCli, CliUsageError } from "./src/cli.js";
export type { CliDeps, CliOptions } from "./src/cli.js";
export { TrialClassifier, classifyIoError, readDirectory } from "./src/classifier.js";
export { parseTrialSubmitConfig } from "./src/config.js";
export {
  TrialEngine,
  UnsafeTrialStateError,
  finishDetectionPass,
  modePass,
  submissionPass,
  validationPass,
} from "./src/engine.js";
export type { PassContext, PassResult, TrialEvent, TrialRunReport } from "./src/engine.js";
export { defaultCommandRunner } from "./src/exec.js";
export { createTrialLogger } from "./src/logger.js";
export type { LogLevel, TrialLogger } from "./src/logger.js";
export { renderSummary, toRunSummary } from "./src/report.js";
export { splitShellWords } from "./src/shell.js";
export { MarkerStore } from "./src/store.js";
export { JobSubmitter } from "./src/submitter.js";
export { TrialRunSummarySchema, TrialStatsSchema } from "./src/types.js";
export type {
  CommandResult,
  CommandRunner,
  ProbeResult,
  TrialMode,
  TrialOutcome,
  TrialRunSummary,
  TrialStats,
  TrialSubmitConfig,
} from "./src/types.js";
