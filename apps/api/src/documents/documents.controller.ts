import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  StreamableFile,
  UseGuards,
} from '@nestjs/common';
import { JobKind } from '@clm/database';
import { CurrentUser, FirebaseAuthGuard } from '../auth';
import type { RequestUser } from '../auth';
import { JobsService } from '../jobs/jobs.service';
import { JobSubmittedDto } from '../jobs/dto/job-submitted.dto';
import { JobViewDto } from '../jobs/dto/job-view.dto';
import { DocumentsService } from './documents.service';
import { GeneratePdfDto } from './dto/generate-pdf.dto';
import { DocumentVerificationDto } from './dto/document-verification.dto';
import { PDF_MIME_TYPE } from './handlers/pdf-generation.handler';

const POLL_BASE_PATH = '/documents/jobs';

/**
 * REST controller for contract documents.
 *
 * Routes:
 *   POST /documents/generate-pdf          - submit a PDF_GENERATION job (202)
 *   GET  /documents/jobs/:jobId           - poll it
 *   GET  /documents/:contractId/download  - stream the latest PDF
 *   POST /documents/:contractId/verify    - compare the stored PDF with its recorded sha256
 *
 * Error responses:
 *   400 - invalid body
 *   401 - missing or invalid token
 *   404 - unknown job, unknown contract, or no PDF generated yet
 *   502 - object storage failure
 */
@Controller('documents')
@UseGuards(FirebaseAuthGuard)
export class DocumentsController {
  constructor(
    private readonly jobsService: JobsService,
    private readonly documentsService: DocumentsService,
  ) {}

  @Post('generate-pdf')
  @HttpCode(HttpStatus.ACCEPTED)
  async generatePdf(
    @Body() dto: GeneratePdfDto,
    @CurrentUser() user: RequestUser,
  ): Promise<JobSubmittedDto> {
    const job = await this.jobsService.submit(JobKind.PDF_GENERATION, dto, user.userId);
    return JobSubmittedDto.fromEntity(job, POLL_BASE_PATH);
  }

  @Get('jobs/:jobId')
  getJob(
    @Param('jobId') jobId: string,
    @CurrentUser() user: RequestUser,
  ): Promise<JobViewDto> {
    return this.jobsService.getStatus(jobId, user.userId, [JobKind.PDF_GENERATION]);
  }

  @Get(':contractId/download')
  async download(
    @Param('contractId', ParseUUIDPipe) contractId: string,
    @CurrentUser() user: RequestUser,
  ): Promise<StreamableFile> {
    const { stream, filename } = await this.documentsService.openLatest(contractId, user.userId);
    return new StreamableFile(stream, {
      type: PDF_MIME_TYPE,
      disposition: `attachment; filename="${filename}"`,
    });
  }

  @Post(':contractId/verify')
  @HttpCode(HttpStatus.OK)
  verify(
    @Param('contractId', ParseUUIDPipe) contractId: string,
    @CurrentUser() user: RequestUser,
  ): Promise<DocumentVerificationDto> {
    return this.documentsService.verify(contractId, user.userId);
  }
}
