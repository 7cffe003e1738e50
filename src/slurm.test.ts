import { describe, expect, it } from "vitest";
import { isAcknowledged, parseSubmittedJobId } from "./slurm.js";

describe("submission acknowledgement", () => {
  it("accepts output whose first word is the acknowledgement", () => {
    expect(isAcknowledged("Submitted batch job 42\n", "Submitted")).toBe(true);
    expect(isAcknowledged("  Submitted 12345", "Submitted")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isAcknowledged("sbatch: error: Batch job submission failed", "Submitted")).toBe(false);
    expect(isAcknowledged("SubmittedX 1", "Submitted")).toBe(false);
    expect(isAcknowledged("", "Submitted")).toBe(false);
  });
});

describe("job id parsing", () => {
  it("parses standard sbatch output", () => {
    expect(parseSubmittedJobId("Submitted batch job 123456\n")).toBe("123456");
  });

  it("falls back to a bare number", () => {
    expect(parseSubmittedJobId("Submitted 12345")).toBe("12345");
  });

  it("returns undefined when there is no id", () => {
    expect(parseSubmittedJobId("Submitted")).toBeUndefined();
    expect(parseSubmittedJobId("Submitted job 42")).toBeUndefined();
  });
});
