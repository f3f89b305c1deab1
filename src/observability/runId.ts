/** Identifies one command invocation in the logs, e.g. `summarize_2026-01-02T03-04-05-000Z_k3j9xq`. */
export function createRunId(command: string, now = new Date()): string {
  const suffix = Math.random().toString(36).slice(2, 8);
  return `${command}_${now.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}
