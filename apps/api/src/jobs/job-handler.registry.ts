import { Injectable, Logger } from '@nestjs/common';
import type { JobKind } from '@clm/database';
import type { JobHandler } from './interfaces/job-handler.interface';
import { UnsupportedJobKindException } from './exceptions/job.exceptions';

/**
 * Kind → handler lookup. Feature modules register their handlers from
 * `onModuleInit`, so the registry is complete before the app listens.
 */
@Injectable()
export class JobHandlerRegistry {
  private readonly logger = new Logger(JobHandlerRegistry.name);
  private readonly handlers = new Map<JobKind, JobHandler>();

  register(handler: JobHandler): void {
    if (this.handlers.has(handler.kind)) {
      throw new Error(`A handler for job kind "${handler.kind}" is already registered`);
    }
    this.handlers.set(handler.kind, handler);
    this.logger.debug(`Registered handler for ${handler.kind}`);
  }

  get(kind: JobKind): JobHandler {
    const handler = this.handlers.get(kind);
    if (!handler) {
      throw new UnsupportedJobKindException(kind);
    }
    return handler;
  }
}
