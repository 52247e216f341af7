import { Module } from '@nestjs/common';
import { ContractsModule } from '../contracts/contracts.module';
import { DocumentsModule } from '../documents/documents.module';
import { AuditController } from './audit.controller';
import { AuditService } from './audit.service';

/**
 * AuditModule - read-only audit trail per contract.
 *
 * Imports:
 *   - ContractsModule: ownership checks and the recorded activity
 *   - DocumentsModule: PdfRenderer for the export
 */
@Module({
  imports: [ContractsModule, DocumentsModule],
  controllers: [AuditController],
  providers: [AuditService],
})
export class AuditModule {}
