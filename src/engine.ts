import { TrialClassifier } from "./classifier.js";
import type { TrialLogger } from "./logger.js";
import { createEmptyStats, rollupStats } from "./stats.js";
import { MarkerStore } from "./store.js";
import { JobSubmitter } from "./submitter.js";
import type {
  CommandRunner,
  SubmissionFailure,
  TrialMode,
  TrialOutcome,
  TrialStats,
  TrialSubmitConfig,
} from "./types.js";

export type TrialEvent = {
  path: string;
  level: "info" | "warn";
  message: string;
  outcome?: TrialOutcome;
  jobId?: string;
  details?: string[];
};

export type PassResult = {
  remaining: string[];
  events: TrialEvent[];
};

export type SubmissionPassResult = PassResult & {
  failure?: SubmissionFailure;
};

export type PassContext = {
  mode: TrialMode;
  markers: MarkerStore;
  classifier: TrialClassifier;
  submitter: JobSubmitter;
  /** Receives each event as soon as it happens, before the pass moves on. */
  emit?: (event: TrialEvent) => void;
};

type EventSink = Pick<PassContext, "emit">;

function createEventLog(ctx: EventSink) {
  const events: TrialEvent[] = [];
  return {
    events,
    push(event: TrialEvent): void {
      events.push(event);
      ctx.emit?.(event);
    },
  };
}

export type TrialRunReport = {
  mode: TrialMode;
  stats: TrialStats;
  outcomes: Map<string, TrialOutcome>;
  jobIds: Map<string, string>;
  submissionFailure?: SubmissionFailure;
};

export class UnsafeTrialStateError extends Error {
  readonly paths: string[];

  constructor(paths: string[]) {
    super(
      `${paths.length} trial${paths.length === 1 ? " is" : "s are"} submitted but unfinished; refusing to continue in safe mode`,
    );
    this.name = "UnsafeTrialStateError";
    this.paths = paths;
  }
}

export function sortedPaths(paths: Iterable<string>): string[] {
  return Array.from(new Set(paths)).sort();
}

function settle(
  path: string,
  outcome: TrialOutcome,
  message: string,
  level: TrialEvent["level"] = "info",
): TrialEvent {
  return { path, outcome, message, level };
}

export async function validationPass(
  remaining: Iterable<string>,
  ctx: Pick<PassContext, "classifier" | "emit">,
): Promise<PassResult> {
  const kept: string[] = [];
  const log = createEventLog(ctx);

  for (const dir of sortedPaths(remaining)) {
    const probe = await ctx.classifier.looksLikeTrial(dir);
    if (!probe.ok) {
      log.push(settle(dir, "invalid.ioerror", `error reading. (${probe.kind}: ${probe.message})`));
    } else if (!probe.value) {
      log.push(settle(dir, "invalid.nottrial", "invalid trial."));
    } else {
      kept.push(dir);
    }
  }

  return { remaining: kept, events: log.events };
}

export async function finishDetectionPass(
  remaining: Iterable<string>,
  ctx: Pick<PassContext, "classifier" | "markers" | "emit">,
): Promise<PassResult> {
  const kept: string[] = [];
  const log = createEventLog(ctx);

  for (const dir of sortedPaths(remaining)) {
    if (await ctx.classifier.looksFinished(dir)) {
      if (await ctx.markers.isMarkedFinished(dir)) {
        log.push(settle(dir, "finished.old", "finished."));
      } else {
        await ctx.markers.markFinished(dir);
        log.push(settle(dir, "finished.new", "finished. (marker added)"));
      }
      await ctx.markers.unmarkSubmitted(dir);
      continue;
    }

    // Someone else may have placed the marker; report it and leave it alone.
    if (await ctx.markers.isMarkedFinished(dir)) {
      log.push(
        settle(dir, "finished.wrong", "looks incomplete, but is marked as finished! Skipping. (!!!)", "warn"),
      );
      continue;
    }

    kept.push(dir);
  }

  return { remaining: kept, events: log.events };
}

export async function modePass(
  remaining: Iterable<string>,
  ctx: Pick<PassContext, "mode" | "markers" | "emit">,
): Promise<PassResult> {
  const ordered = sortedPaths(remaining);

  switch (ctx.mode) {
    case "safe": {
      const unsafe: string[] = [];
      for (const dir of ordered) {
        if ((await ctx.markers.isMarkedSubmitted(dir)) && !(await ctx.markers.isMarkedFinished(dir))) {
          unsafe.push(dir);
        }
      }
      if (unsafe.length > 0) {
        throw new UnsafeTrialStateError(unsafe);
      }
      return { remaining: ordered, events: [] };
    }

    case "skip": {
      const kept: string[] = [];
      const log = createEventLog(ctx);
      for (const dir of ordered) {
        if (await ctx.markers.isMarkedSubmitted(dir)) {
          log.push(settle(dir, "skipped", "unfinished, but already submitted! Skipping. (-s)"));
        } else {
          kept.push(dir);
        }
      }
      return { remaining: kept, events: log.events };
    }

    case "resume":
      // Submitted-but-unfinished trials stay in; the submission pass resubmits them.
      return { remaining: ordered, events: [] };

    case "check": {
      const log = createEventLog(ctx);
      for (const dir of ordered) {
        log.push(settle(dir, "unfinished", "not finished. (!!!)", "warn"));
      }
      return { remaining: [], events: log.events };
    }

    default:
      ctx.mode satisfies never;
      throw new Error(`Unsupported mode: ${String(ctx.mode)}`);
  }
}

/**
 * Submits trials in order and stops at the first refusal. The refused trial
 * and everything after it are returned as still remaining.
 */
export async function submissionPass(
  remaining: Iterable<string>,
  ctx: Pick<PassContext, "markers" | "submitter" | "emit">,
): Promise<SubmissionPassResult> {
  const ordered = sortedPaths(remaining);
  const log = createEventLog(ctx);

  for (const [index, dir] of ordered.entries()) {
    const result = await ctx.submitter.submit(dir);
    if (!result.success) {
      log.push({
        path: dir,
        level: "warn",
        message: "failed to submit. (!!!)",
        details: [result.message, result.stderr].filter((line) => line.length > 0),
      });
      return {
        remaining: ordered.slice(index),
        events: log.events,
        failure: { path: dir, message: result.message, stderr: result.stderr },
      };
    }

    const resumed = await ctx.markers.isMarkedSubmitted(dir);
    const event = resumed
      ? settle(dir, "submitted.resumed", `unfinished, resuming. (-r) (${result.message})`)
      : settle(dir, "submitted.new", `submitted! (${result.message})`);
    log.push(result.jobId ? { ...event, jobId: result.jobId } : event);
    await ctx.markers.markSubmitted(dir);
  }

  return { remaining: [], events: log.events };
}

export type TrialEngineParams = {
  config: TrialSubmitConfig;
  logger: TrialLogger;
  runner?: CommandRunner;
};

export class TrialEngine {
  private readonly logger: TrialLogger;
  private readonly markers: MarkerStore;
  private readonly classifier: TrialClassifier;
  private readonly submitter: JobSubmitter;

  constructor(params: TrialEngineParams) {
    this.logger = params.logger;
    this.markers = new MarkerStore(params.config.markers);
    this.classifier = new TrialClassifier({ config: params.config, logger: params.logger });
    this.submitter = new JobSubmitter({
      config: params.config,
      logger: params.logger,
      runner: params.runner,
    });
  }

  async run(dirs: Iterable<string>, mode: TrialMode): Promise<TrialRunReport> {
    const report: TrialRunReport = {
      mode,
      stats: createEmptyStats(),
      outcomes: new Map(),
      jobIds: new Map(),
    };
    const ctx: PassContext = {
      mode,
      markers: this.markers,
      classifier: this.classifier,
      submitter: this.submitter,
      emit: (event) => this.handle(report, event),
    };

    let remaining = sortedPaths(dirs);
    report.stats.all = remaining.length;

    remaining = (await validationPass(remaining, ctx)).remaining;
    rollupStats(report.stats, "invalid");
    report.stats.valid = remaining.length;

    remaining = (await finishDetectionPass(remaining, ctx)).remaining;
    rollupStats(report.stats, "finished");

    remaining = (await modePass(remaining, ctx)).remaining;
    if (mode === "check") {
      return report;
    }

    const submission = await submissionPass(remaining, ctx);
    remaining = submission.remaining;
    rollupStats(report.stats, "submitted");

    for (const dir of remaining) {
      this.record(report, dir, "unprocessed");
    }
    if (submission.failure) {
      report.submissionFailure = submission.failure;
    }

    return report;
  }

  private handle(report: TrialRunReport, event: TrialEvent): void {
    const line = `${event.path}: ${event.message}`;
    if (event.level === "warn") {
      this.logger.warn(line);
    } else {
      this.logger.info(line);
    }
    for (const detail of event.details ?? []) {
      this.logger.warn(`--> ${detail}`);
    }

    if (event.outcome) {
      this.record(report, event.path, event.outcome);
    }
    if (event.jobId) {
      report.jobIds.set(event.path, event.jobId);
    }
  }

  private record(report: TrialRunReport, dir: string, outcome: TrialOutcome): void {
    const previous = report.outcomes.get(dir);
    if (previous) {
      throw new Error(`${dir} already has outcome ${previous}; cannot assign ${outcome}`);
    }
    report.outcomes.set(dir, outcome);
    report.stats[outcome] += 1;
  }
}
