import { Controller, Get, Param, UseGuards } from '@nestjs/common';
import { FirebaseAuthGuard, CurrentUser } from '../auth';
import type { RequestUser } from '../auth';
import { JobsService } from './jobs.service';
import { JobViewDto } from './dto/job-view.dto';

/**
 * Routes:
 *   GET /jobs/:jobId - poll any job the caller submitted
 */
@Controller('jobs')
@UseGuards(FirebaseAuthGuard)
export class JobsController {
  constructor(private readonly jobsService: JobsService) {}

  @Get(':jobId')
  getJob(
    @Param('jobId') jobId: string,
    @CurrentUser() user: RequestUser,
  ): Promise<JobViewDto> {
    return this.jobsService.getStatus(jobId, user.userId);
  }
}
