import type { CandidateOutcome, Manifest } from "../types";

/** Every uploaded location of the successful candidates, in candidate order. */
export function buildManifest(jobName: string, downloadedAt: Date, outcomes: readonly CandidateOutcome[]): Manifest {
  return {
    job: jobName,
    downloaded_at: downloadedAt.toISOString(),
    files: outcomes.flatMap((outcome) => (outcome.status === "succeeded" ? outcome.locations : [])),
  };
}

export function serializeManifest(manifest: Manifest): Buffer {
  return Buffer.from(JSON.stringify(manifest, null, 2), "utf-8");
}
