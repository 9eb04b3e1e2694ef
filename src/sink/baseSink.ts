import { ConfigurationError } from "../core/errors";
import type { CandidateOutcome } from "../types";
import type { ManifestPublication, Sink } from "./types";

export abstract class BaseSink implements Sink {
  abstract publishOutcomes(runId: string, outcomes: CandidateOutcome[]): Promise<void>;
  abstract publishManifest(runId: string, publication: ManifestPublication): Promise<void>;

  protected ensureConfigured(name: string, value: string | undefined): string {
    if (!value) {
      throw new ConfigurationError(`${name} sink is not configured`);
    }
    return value;
  }
}

export class NoopSink extends BaseSink {
  async publishOutcomes(_runId: string, _outcomes: CandidateOutcome[]): Promise<void> {
    return;
  }

  async publishManifest(_runId: string, _publication: ManifestPublication): Promise<void> {
    return;
  }
}
