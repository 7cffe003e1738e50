import fs from "node:fs/promises";
import path from "node:path";
import { DEFAULT_MARKERS } from "./config.js";
import type { MarkerKind } from "./types.js";

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Zero-byte sentinel files recording per-trial progress. Every query goes to
 * the filesystem; nothing is cached between calls.
 */
export class MarkerStore {
  private readonly names: Record<MarkerKind, string>;

  constructor(names: Record<MarkerKind, string> = DEFAULT_MARKERS) {
    this.names = { ...names };
  }

  markerPath(trialDir: string, kind: MarkerKind): string {
    return path.join(trialDir, this.names[kind]);
  }

  async isMarked(trialDir: string, kind: MarkerKind): Promise<boolean> {
    return await pathExists(this.markerPath(trialDir, kind));
  }

  async mark(trialDir: string, kind: MarkerKind): Promise<void> {
    // Appending nothing creates the file if needed and leaves an existing one as is.
    await fs.appendFile(this.markerPath(trialDir, kind), "");
  }

  async unmark(trialDir: string, kind: MarkerKind): Promise<void> {
    await fs.rm(this.markerPath(trialDir, kind), { force: true });
  }

  async isMarkedFinished(trialDir: string): Promise<boolean> {
    return await this.isMarked(trialDir, "finished");
  }

  async isMarkedSubmitted(trialDir: string): Promise<boolean> {
    return await this.isMarked(trialDir, "submitted");
  }

  async markFinished(trialDir: string): Promise<void> {
    await this.mark(trialDir, "finished");
  }

  async markSubmitted(trialDir: string): Promise<void> {
    await this.mark(trialDir, "submitted");
  }

  async unmarkSubmitted(trialDir: string): Promise<void> {
    await this.unmark(trialDir, "submitted");
  }
}
