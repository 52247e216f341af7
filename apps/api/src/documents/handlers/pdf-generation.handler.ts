import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { createHash } from 'crypto';
import { JobKind } from '@clm/database';
import { JobHandlerRegistry } from '../../jobs/job-handler.registry';
import type { JobContext, JobHandler } from '../../jobs/interfaces/job-handler.interface';
import { ContractsService } from '../../contracts/contracts.service';
import { StorageService } from '../../storage/storage.service';
import { PdfRenderer } from '../rendering/pdf-renderer';
import { GeneratePdfDto } from '../dto/generate-pdf.dto';
import { ContractHasNoContentException } from '../exceptions/document.exceptions';

export const PDF_MIME_TYPE = 'application/pdf';

export interface PdfGenerationResult extends Record<string, unknown> {
  documentKey: string;
  /** sha256, hex */
  documentHash: string;
  sizeBytes: number;
}

/**
 * PDF_GENERATION jobs: render the contract's latest content, store it and
 * point the contract at the new document.
 *
 * Object key pattern: contracts/{contractId}/{jobId}.pdf
 */
@Injectable()
export class PdfGenerationHandler
  implements JobHandler<GeneratePdfDto, PdfGenerationResult>, OnModuleInit
{
  readonly kind = JobKind.PDF_GENERATION;
  readonly parametersType = GeneratePdfDto;

  private readonly logger = new Logger(PdfGenerationHandler.name);

  constructor(
    private readonly registry: JobHandlerRegistry,
    private readonly contractsService: ContractsService,
    private readonly renderer: PdfRenderer,
    private readonly storage: StorageService,
  ) {}

  onModuleInit(): void {
    this.registry.register(this);
  }

  async run(parameters: GeneratePdfDto, context: JobContext): Promise<PdfGenerationResult> {
    const contract = await this.contractsService.getOwned(
      parameters.contractId,
      context.requestedBy,
    );

    const latest = await this.contractsService.findLatestVersion(contract.id);
    if (!latest) {
      throw new ContractHasNoContentException(contract.id);
    }

    const bytes = Buffer.from(
      await this.renderer.render({ title: contract.title, content: latest.content }),
    );
    const documentHash = createHash('sha256').update(bytes).digest('hex');
    const documentKey = `contracts/${contract.id}/${context.jobId}.pdf`;

    context.signal.throwIfAborted();
    await this.storage.upload(documentKey, bytes, PDF_MIME_TYPE);
    context.signal.throwIfAborted();
    await this.contractsService.recordDocument(contract.id, documentKey, documentHash);

    this.logger.log(
      `Rendered content v${latest.version} of ${contract.id} to ${documentKey} (${bytes.length} bytes)`,
    );

    return { documentKey, documentHash, sizeBytes: bytes.length };
  }
}
