import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as Minio from 'minio';
import type { Readable } from 'stream';
import { StorageService } from './storage.service';
import {
  StorageDownloadException,
  StorageUploadException,
} from './storage.exceptions';

/**
 * MinIO (S3-compatible) implementation of StorageService.
 *
 * Object key pattern used by callers:  contracts/{contractId}/{jobId}.pdf
 */
@Injectable()
export class MinioStorageService extends StorageService implements OnModuleInit {
  private readonly logger = new Logger(MinioStorageService.name);
  private readonly client: Minio.Client;
  private readonly bucket: string;
  private readonly endpoint: string;
  private readonly port: number;

  constructor(private readonly configService: ConfigService) {
    super();
    this.endpoint = this.configService.get<string>('MINIO_ENDPOINT', 'localhost');
    this.port = Number(this.configService.get<number | string>('MINIO_PORT', 9000));
    this.bucket = this.configService.get<string>('MINIO_BUCKET', 'clm-documents');

    this.client = new Minio.Client({
      endPoint: this.endpoint,
      port: this.port,
      useSSL: this.configService.get<string>('MINIO_USE_SSL', 'false') === 'true',
      accessKey: this.configService.get<string>('MINIO_ACCESS_KEY', 'minioadmin'),
      secretKey: this.configService.get<string>('MINIO_SECRET_KEY', 'minioadmin_secret'),
    });
  }

  /** Ensures the bucket exists once the module bootstraps. */
  async onModuleInit(): Promise<void> {
    await this.ensureBucketExists();
    this.logger.log(
      `Storage ready - bucket "${this.bucket}" @ ${this.endpoint}:${this.port}`,
    );
  }

  async upload(objectKey: string, body: Buffer, mimeType: string): Promise<void> {
    this.logger.debug(`Uploading ${objectKey} (${body.length} bytes)`);

    try {
      await this.client.putObject(this.bucket, objectKey, body, body.length, {
        'Content-Type': mimeType,
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Failed to upload "${objectKey}" to MinIO: ${cause.message}`);
      throw new StorageUploadException(objectKey, cause);
    }

    this.logger.log(`Uploaded "${objectKey}" (${body.length} bytes)`);
  }

  async download(objectKey: string): Promise<Readable> {
    try {
      return await this.client.getObject(this.bucket, objectKey);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Failed to read "${objectKey}" from MinIO: ${cause.message}`);
      throw new StorageDownloadException(objectKey, cause);
    }
  }

  async isReachable(): Promise<boolean> {
    try {
      return await this.client.bucketExists(this.bucket);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`MinIO health check failed: ${message}`);
      return false;
    }
  }

  private async ensureBucketExists(): Promise<void> {
    try {
      const exists = await this.client.bucketExists(this.bucket);
      if (!exists) {
        await this.client.makeBucket(this.bucket, 'us-east-1');
        this.logger.log(`Created bucket "${this.bucket}"`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      // Non-fatal: uploads will fail with StorageUploadException instead
      this.logger.error(`Failed to ensure bucket "${this.bucket}" exists: ${message}`);
    }
  }
}
