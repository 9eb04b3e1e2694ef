export function createRunId(jobName?: string, now = new Date()): string {
  const suffix = Math.random().toString(36).slice(2, 8);
  const stamp = now.toISOString().replace(/[:.]/g, "-");
  return jobName ? `run_${jobName}_${stamp}_${suffix}` : `run_${stamp}_${suffix}`;
}
