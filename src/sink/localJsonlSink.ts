import fs from "node:fs";
import path from "node:path";
import type { CandidateOutcome } from "../types";
import { BaseSink } from "./baseSink";
import type { ManifestPublication } from "./types";

export class LocalJsonlSink extends BaseSink {
  private readonly outcomesPath: string;
  private readonly manifestsPath: string;

  constructor(outputDir: string) {
    super();
    const resolved = path.resolve(outputDir);
    this.outcomesPath = path.join(resolved, "outcomes.jsonl");
    this.manifestsPath = path.join(resolved, "manifests.jsonl");
  }

  async publishOutcomes(runId: string, outcomes: CandidateOutcome[]): Promise<void> {
    await this.appendLines(
      this.outcomesPath,
      outcomes.map((outcome) => ({
        runId,
        ...outcome,
      })),
    );
  }

  async publishManifest(runId: string, publication: ManifestPublication): Promise<void> {
    await this.appendLines(this.manifestsPath, [{ runId, ...publication }]);
  }

  private async appendLines(filePath: string, records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(filePath, content, "utf-8");
  }
}
