export function createRunId(mode: string, now = new Date()): string {
  const suffix = Math.random().toString(36).slice(2, 8);
  return `${mode}_${now.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}
