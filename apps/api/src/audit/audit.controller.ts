import { Controller, Get, Param, ParseUUIDPipe, StreamableFile, UseGuards } from '@nestjs/common';
import { FirebaseAuthGuard, CurrentUser } from '../auth';
import type { RequestUser } from '../auth';
import { AuditService } from './audit.service';
import { AuditTrailDto } from './dto/audit-trail.dto';
import { PDF_MIME_TYPE } from '../documents/handlers/pdf-generation.handler';

/**
 * Routes:
 *   GET /audit/contracts/:id/trail   - events, oldest first
 *   GET /audit/contracts/:id/export  - the same trail as a PDF attachment
 */
@Controller('audit')
@UseGuards(FirebaseAuthGuard)
export class AuditController {
  constructor(private readonly auditService: AuditService) {}

  @Get('contracts/:id/trail')
  trail(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<AuditTrailDto> {
    return this.auditService.trail(id, user.userId);
  }

  @Get('contracts/:id/export')
  async export(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<StreamableFile> {
    const { body, filename } = await this.auditService.export(id, user.userId);
    return new StreamableFile(body, {
      type: PDF_MIME_TYPE,
      disposition: `attachment; filename="${filename}"`,
    });
  }
}
