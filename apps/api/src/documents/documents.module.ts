import { Module } from '@nestjs/common';
import { JobsModule } from '../jobs/jobs.module';
import { ContractsModule } from '../contracts/contracts.module';
import { StorageModule } from '../storage/storage.module';
import { DocumentsController } from './documents.controller';
import { DocumentsService } from './documents.service';
import { PdfGenerationHandler } from './handlers/pdf-generation.handler';
import { PdfRenderer } from './rendering/pdf-renderer';
import { PdfLibRenderer } from './rendering/pdf-lib-renderer';

/**
 * DocumentsModule - PDF generation jobs and downloads.
 *
 * Imports:
 *   - JobsModule:      submission, polling and the handler registry
 *   - ContractsModule: ownership checks and content versions
 *   - StorageModule:   StorageService (MinIO)
 */
@Module({
  imports: [JobsModule, ContractsModule, StorageModule],
  controllers: [DocumentsController],
  providers: [
    DocumentsService,
    PdfGenerationHandler,
    { provide: PdfRenderer, useClass: PdfLibRenderer },
  ],
  exports: [PdfRenderer],
})
export class DocumentsModule {}
