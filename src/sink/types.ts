import type { CandidateOutcome, Manifest } from "../types";

export interface ManifestPublication {
  manifest: Manifest;
  location?: string;
  datasetName: string;
}

export interface Sink {
  publishOutcomes(runId: string, outcomes: CandidateOutcome[]): Promise<void>;
  publishManifest(runId: string, publication: ManifestPublication): Promise<void>;
}
