import fs from "node:fs";
import { PutObjectCommand, S3Client, type S3ClientConfig } from "@aws-sdk/client-s3";
import { BaseObjectStore } from "./baseObjectStore";

interface S3ClientLike {
  send(command: PutObjectCommand): Promise<unknown>;
}

export interface S3ObjectStoreOptions {
  region?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  client?: S3ClientLike;
}

function createClient(options: S3ObjectStoreOptions): S3Client {
  const config: S3ClientConfig = { region: options.region || "us-east-1" };
  if (options.endpoint) {
    config.endpoint = options.endpoint;
    config.forcePathStyle = options.forcePathStyle ?? true;
  }
  return new S3Client(config);
}

export class S3ObjectStore extends BaseObjectStore {
  readonly scheme = "s3";
  private readonly client: S3ClientLike;

  constructor(options: S3ObjectStoreOptions = {}) {
    super();
    this.client = options.client ?? createClient(options);
  }

  protected async writeFile(bucket: string, localPath: string, key: string, contentType?: string): Promise<void> {
    const { size } = await fs.promises.stat(localPath);
    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: fs.createReadStream(localPath),
        ContentLength: size,
        ContentType: contentType,
      }),
    );
  }

  protected async writeBytes(bucket: string, bytes: Uint8Array, key: string, contentType?: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: bytes,
        ContentLength: bytes.byteLength,
        ContentType: contentType,
      }),
    );
  }
}
