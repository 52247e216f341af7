import { Module } from '@nestjs/common';
import { JobsController } from './jobs.controller';
import { JobsService } from './jobs.service';
import { JobRunner } from './job-runner.service';
import { JobWatchdog } from './job-watchdog.service';
import { JobHandlerRegistry } from './job-handler.registry';
import { JobsRepository } from './repositories/jobs.repository';
import { TypeOrmJobsRepository } from './repositories/typeorm-jobs.repository';

/**
 * JobsModule - the async job tracker.
 *
 * Feature modules import it, register a JobHandler with JobHandlerRegistry,
 * and submit through JobsService.
 */
@Module({
  controllers: [JobsController],
  providers: [
    JobsService,
    JobRunner,
    JobWatchdog,
    JobHandlerRegistry,
    { provide: JobsRepository, useClass: TypeOrmJobsRepository },
  ],
  exports: [JobsService, JobHandlerRegistry],
})
export class JobsModule {}
