import crypto from "node:crypto";
import { SendMessageBatchCommand, SQSClient } from "@aws-sdk/client-sqs";
import { sleep } from "../core/retry";
import type { CandidateOutcome } from "../types";
import { BaseSink } from "./baseSink";
import type { ManifestPublication } from "./types";

interface SqsClientLike {
  send(command: SendMessageBatchCommand): Promise<{ Failed?: Array<{ Id?: string; SenderFault?: boolean }> }>;
}

export interface SqsSinkOptions {
  queueUrl?: string;
  client?: SqsClientLike;
  fifo?: boolean;
  groupId?: string;
  maxRetries?: number;
  retryDelayMs?: number;
}

interface BatchEntry {
  Id: string;
  MessageBody: string;
  MessageDeduplicationId?: string;
  MessageGroupId?: string;
}

interface SqsMessage {
  dedupeKey: string;
  body: unknown;
}

const BATCH_LIMIT = 10;

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class SqsSink extends BaseSink {
  private readonly queueUrl?: string;
  private readonly client: SqsClientLike;
  private readonly fifo: boolean;
  private readonly groupId: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: SqsSinkOptions = {}) {
    super();
    this.queueUrl = options.queueUrl;
    this.client = options.client ?? new SQSClient({});
    this.fifo = options.fifo ?? Boolean(this.queueUrl?.endsWith(".fifo"));
    this.groupId = options.groupId ?? "doc-ingest";
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 200;
  }

  async publishOutcomes(runId: string, outcomes: CandidateOutcome[]): Promise<void> {
    await this.publish(
      outcomes.map((outcome) => ({
        dedupeKey: `${runId}:outcome:${outcome.url}`,
        body: { stage: "outcome", runId, sentAt: new Date().toISOString(), payload: outcome },
      })),
    );
  }

  async publishManifest(runId: string, publication: ManifestPublication): Promise<void> {
    await this.publish([
      {
        dedupeKey: `${runId}:manifest`,
        body: { stage: "manifest", runId, sentAt: new Date().toISOString(), payload: publication },
      },
    ]);
  }

  private async publish(messages: SqsMessage[]): Promise<void> {
    if (messages.length === 0) {
      return;
    }

    const queueUrl = this.ensureConfigured("SQS", this.queueUrl);

    const entries = messages.map((message, index) => {
      const entry: BatchEntry = {
        Id: String(index),
        MessageBody: JSON.stringify(message.body),
      };

      if (this.fifo) {
        entry.MessageGroupId = this.groupId;
        // FIFO deduplication ids are capped at 128 characters.
        entry.MessageDeduplicationId = crypto.createHash("sha256").update(message.dedupeKey).digest("hex");
      }

      return entry;
    });

    for (const entryBatch of chunk(entries, BATCH_LIMIT)) {
      await this.sendBatchWithRetries(queueUrl, entryBatch);
    }
  }

  private async sendBatchWithRetries(queueUrl: string, originalEntries: BatchEntry[]): Promise<void> {
    let pendingEntries = [...originalEntries];
    let attempt = 0;

    while (pendingEntries.length > 0) {
      attempt += 1;
      const command = new SendMessageBatchCommand({
        QueueUrl: queueUrl,
        Entries: pendingEntries,
      });
      const response = await this.client.send(command);

      const failedIds = new Set((response.Failed ?? []).map((f) => f.Id).filter((id): id is string => Boolean(id)));
      if (failedIds.size === 0) {
        return;
      }

      if (attempt > this.maxRetries) {
        throw new Error(`SQS publish failed after retries (${failedIds.size} entries still failed)`);
      }

      pendingEntries = pendingEntries.filter((entry) => failedIds.has(entry.Id));
      await sleep(this.retryDelayMs * attempt);
    }
  }
}
