import { createReadStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { createInterface } from "node:readline";
import type { TrialLogger } from "./logger.js";
import { pathExists } from "./store.js";
import type { IoErrorKind, ProbeResult, TrialSubmitConfig } from "./types.js";

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function classifyIoError(err: unknown): IoErrorKind {
  switch (errorCode(err)) {
    case "ENOENT":
      return "not-found";
    case "EACCES":
    case "EPERM":
      return "permission-denied";
    case "ENOTDIR":
      return "not-a-directory";
    default:
      return "other";
  }
}

export async function readDirectory(dirPath: string): Promise<ProbeResult<string[]>> {
  try {
    return { ok: true, value: await fs.readdir(dirPath) };
  } catch (err) {
    return {
      ok: false,
      kind: classifyIoError(err),
      message: err instanceof Error ? err.message : String(err),
    };
  }
}

export type TrialClassifierParams = {
  config: Pick<TrialSubmitConfig, "inputArtifact" | "outputArtifact" | "completionMarker">;
  logger: TrialLogger;
};

export class TrialClassifier {
  private readonly inputArtifact: string;
  private readonly outputArtifact: string;
  private readonly completionMarker: string;
  private readonly logger: TrialLogger;

  constructor(params: TrialClassifierParams) {
    this.inputArtifact = params.config.inputArtifact;
    this.outputArtifact = params.config.outputArtifact;
    this.completionMarker = params.config.completionMarker;
    this.logger = params.logger;
  }

  /**
   * A directory that does not exist is simply not a trial; any other failure
   * to list it (permissions, not a directory) comes back as an error result.
   */
  async looksLikeTrial(trialDir: string): Promise<ProbeResult<boolean>> {
    const listing = await readDirectory(trialDir);
    if (listing.ok) {
      return { ok: true, value: listing.value.includes(this.inputArtifact) };
    }
    if (listing.kind === "not-found") {
      return { ok: true, value: false };
    }
    return listing;
  }

  async countCompletionMarkers(trialDir: string): Promise<number> {
    const haystack = path.join(trialDir, this.outputArtifact);
    if (!(await pathExists(haystack))) {
      return 0;
    }

    const lines = createInterface({
      input: createReadStream(haystack, { encoding: "utf8" }),
      crlfDelay: Infinity,
    });
    let count = 0;
    for await (const line of lines) {
      if (line.includes(this.completionMarker)) {
        count += 1;
      }
    }
    return count;
  }

  async looksFinished(trialDir: string): Promise<boolean> {
    const count = await this.countCompletionMarkers(trialDir);
    if (count > 1) {
      this.logger.warn(
        `Completion check may be unreliable: found "${this.completionMarker}" ${count} times in ${path.join(trialDir, this.outputArtifact)}`,
      );
    }
    return count > 0;
  }
}
