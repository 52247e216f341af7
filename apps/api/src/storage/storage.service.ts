import type { Readable } from 'stream';

/**
 * Object storage port. Callers choose the object key; implementations
 * only move bytes.
 */
export abstract class StorageService {
  /**
   * @throws StorageUploadException on any store error
   */
  abstract upload(objectKey: string, body: Buffer, mimeType: string): Promise<void>;

  /**
   * @throws StorageDownloadException on any store error
   */
  abstract download(objectKey: string): Promise<Readable>;

  /** Whether the store answers and the bucket exists. Never throws. */
  abstract isReachable(): Promise<boolean>;
}
