import { splitShellWords } from "./shell.js";
import type { TrialSubmitConfig } from "./types.js";

export const SCHEDULER_FLAGS_ENV = "SUBMIT_SFLAGS";
export const JOB_COMMAND_ENV = "SUBMIT_VASP";

export const DEFAULT_SCHEDULER_FLAGS = "-p small -n 64 -t 02:00:00 -o out-%j";
export const DEFAULT_JOB_COMMAND = "vasp.slm";

export const DEFAULT_MARKERS = {
  finished: "finished",
  submitted: "submitted",
} as const;

type EnvRecord = Record<string, string | undefined>;

function readWords(env: EnvRecord, field: string, fallback: string): string[] {
  const raw = env[field] ?? fallback;
  try {
    return splitShellWords(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new Error(`${field} is not a valid shell word list: ${detail}`);
  }
}

export function parseTrialSubmitConfig(env: EnvRecord = {}): TrialSubmitConfig {
  const schedulerFlags = readWords(env, SCHEDULER_FLAGS_ENV, DEFAULT_SCHEDULER_FLAGS);
  const jobCommand = readWords(env, JOB_COMMAND_ENV, DEFAULT_JOB_COMMAND);
  if (jobCommand.length === 0) {
    throw new Error(`${JOB_COMMAND_ENV} must name a job command`);
  }

  return Object.freeze({
    schedulerCommand: "sbatch",
    schedulerFlags,
    jobCommand,
    inputArtifact: "INCAR",
    outputArtifact: "OUTCAR",
    completionMarker: "Voluntary",
    acknowledgement: "Submitted",
    markers: { ...DEFAULT_MARKERS },
  });
}
