/**
 * The scheduler acknowledges a submission by starting its output with a fixed
 * word. Anything else, including empty output, counts as a refusal.
 */
export function isAcknowledged(stdout: string, acknowledgement: string): boolean {
  const [first] = stdout.trim().split(/\s+/);
  return first === acknowledgement;
}

export function parseSubmittedJobId(stdout: string): string | undefined {
  const text = stdout.trim();
  const strict = /Submitted\s+batch\s+job\s+(\d+)/i.exec(text);
  if (strict?.[1]) {
    return strict[1];
  }
  const bare = /\b(\d{3,})\b/.exec(text);
  return bare?.[1];
}
