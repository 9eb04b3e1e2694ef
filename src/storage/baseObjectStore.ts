import { UploadError } from "../core/errors";
import { toUri, type ObjectStore, type StorageScheme } from "./objectStore";

export abstract class BaseObjectStore implements ObjectStore {
  abstract readonly scheme: StorageScheme;

  protected abstract writeFile(bucket: string, localPath: string, key: string, contentType?: string): Promise<void>;
  protected abstract writeBytes(bucket: string, bytes: Uint8Array, key: string, contentType?: string): Promise<void>;

  async putFile(bucket: string, localPath: string, key: string, contentType?: string): Promise<string> {
    const uri = toUri(this.scheme, bucket, key);
    try {
      await this.writeFile(bucket, localPath, key, contentType);
    } catch (error) {
      throw new UploadError(uri, key, { cause: error });
    }
    return uri;
  }

  async putBytes(bucket: string, bytes: Uint8Array, key: string, contentType?: string): Promise<string> {
    const uri = toUri(this.scheme, bucket, key);
    try {
      await this.writeBytes(bucket, bytes, key, contentType);
    } catch (error) {
      throw new UploadError(uri, key, { cause: error });
    }
    return uri;
  }
}
