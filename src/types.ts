import { Type, type Static } from "@sinclair/typebox";

export const TrialModeSchema = Type.Union([
  Type.Literal("safe"),
  Type.Literal("check"),
  Type.Literal("skip"),
  Type.Literal("resume"),
]);

export type TrialMode = Static<typeof TrialModeSchema>;

export const TrialOutcomeSchema = Type.Union([
  Type.Literal("invalid.nottrial"),
  Type.Literal("invalid.ioerror"),
  Type.Literal("finished.old"),
  Type.Literal("finished.new"),
  Type.Literal("finished.wrong"),
  Type.Literal("skipped"),
  Type.Literal("unfinished"),
  Type.Literal("submitted.new"),
  Type.Literal("submitted.resumed"),
  Type.Literal("unprocessed"),
]);

export type TrialOutcome = Static<typeof TrialOutcomeSchema>;

const Count = Type.Integer({ minimum: 0 });

export const TrialStatsSchema = Type.Object({
  all: Count,
  invalid: Count,
  "invalid.nottrial": Count,
  "invalid.ioerror": Count,
  valid: Count,
  finished: Count,
  "finished.old": Count,
  "finished.new": Count,
  "finished.wrong": Count,
  skipped: Count,
  unfinished: Count,
  submitted: Count,
  "submitted.new": Count,
  "submitted.resumed": Count,
  unprocessed: Count,
});

export type TrialStats = Static<typeof TrialStatsSchema>;

export type StatKey = keyof TrialStats;

export const SubmissionFailureSchema = Type.Object({
  path: Type.String(),
  message: Type.String(),
  stderr: Type.String(),
});

export type SubmissionFailure = Static<typeof SubmissionFailureSchema>;

export const TrialRunSummarySchema = Type.Object(
  {
    mode: TrialModeSchema,
    stats: TrialStatsSchema,
    trials: Type.Array(
      Type.Object({
        path: Type.String(),
        outcome: TrialOutcomeSchema,
        jobId: Type.Optional(Type.String()),
      }),
    ),
    submissionFailure: Type.Optional(SubmissionFailureSchema),
  },
  { additionalProperties: false },
);

export type TrialRunSummary = Static<typeof TrialRunSummarySchema>;

export type MarkerKind = "finished" | "submitted";

export type TrialSubmitConfig = {
  schedulerCommand: string;
  schedulerFlags: string[];
  jobCommand: string[];
  inputArtifact: string;
  outputArtifact: string;
  completionMarker: string;
  acknowledgement: string;
  markers: Record<MarkerKind, string>;
};

export type IoErrorKind = "not-found" | "permission-denied" | "not-a-directory" | "other";

export type ProbeResult<T> =
  | { ok: true; value: T }
  | { ok: false; kind: IoErrorKind; message: string };

export type SubmitResult = {
  success: boolean;
  message: string;
  stderr: string;
  jobId?: string;
};

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type CommandRunner = (
  command: string,
  args: string[],
  options?: { cwd?: string },
) => Promise<CommandResult>;
