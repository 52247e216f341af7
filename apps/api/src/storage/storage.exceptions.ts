import { HttpStatus } from '@nestjs/common';
import { ApiException } from '../common/exceptions/api.exception';

/**
 * Thrown when an object cannot be written to the object store.
 *
 * Maps to HTTP 502 Bad Gateway because the failure is in the upstream
 * storage service (MinIO), not in the client's request.
 */
export class StorageUploadException extends ApiException {
  constructor(objectKey: string, cause: Error) {
    super(
      HttpStatus.BAD_GATEWAY,
      'Bad Gateway',
      'STORAGE_ERROR',
      `Failed to upload "${objectKey}" to object storage`,
      cause,
    );
  }
}

/** Reading a stored object failed. HTTP 502. */
export class StorageDownloadException extends ApiException {
  constructor(objectKey: string, cause: Error) {
    super(
      HttpStatus.BAD_GATEWAY,
      'Bad Gateway',
      'STORAGE_ERROR',
      `Failed to read "${objectKey}" from object storage`,
      cause,
    );
  }
}
