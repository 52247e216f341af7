import { Injectable } from '@nestjs/common';
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { StorageService } from '../storage/storage.service';

/** Reports the document bucket as up or down. */
@Injectable()
export class StorageHealthIndicator extends HealthIndicator {
  constructor(private readonly storage: StorageService) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const reachable = await this.storage.isReachable();
    const result = this.getStatus(key, reachable);
    if (!reachable) {
      throw new HealthCheckError('Document storage is unreachable', result);
    }
    return result;
  }
}
