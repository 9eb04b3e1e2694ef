export type StorageScheme = "s3" | "local" | "memory";

export interface ObjectStore {
  readonly scheme: StorageScheme;
  /** Uploads a local file and returns its `scheme://bucket/key` location. */
  putFile(bucket: string, localPath: string, key: string, contentType?: string): Promise<string>;
  putBytes(bucket: string, bytes: Uint8Array, key: string, contentType?: string): Promise<string>;
}

export function toUri(scheme: StorageScheme, bucket: string, key: string): string {
  return `${scheme}://${bucket}/${key}`;
}
