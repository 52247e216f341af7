import { Module } from '@nestjs/common';
import { StorageService } from './storage.service';
import { MinioStorageService } from './minio-storage.service';

/**
 * StorageModule - object storage behind the StorageService port.
 */
@Module({
  providers: [{ provide: StorageService, useClass: MinioStorageService }],
  exports: [StorageService],
})
export class StorageModule {}
