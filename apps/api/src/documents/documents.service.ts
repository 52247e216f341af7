import { Injectable, Logger } from '@nestjs/common';
import { createHash } from 'crypto';
import type { Readable } from 'stream';
import { ContractsService } from '../contracts/contracts.service';
import { StorageService } from '../storage/storage.service';
import { DocumentNotFoundException } from './exceptions/document.exceptions';
import { DocumentVerificationDto } from './dto/document-verification.dto';

export interface DocumentDownload {
  stream: Readable;
  filename: string;
}

/** Read side of generated documents. */
@Injectable()
export class DocumentsService {
  private readonly logger = new Logger(DocumentsService.name);

  constructor(
    private readonly contractsService: ContractsService,
    private readonly storage: StorageService,
  ) {}

  /**
   * Opens the contract's latest PDF.
   *
   * @throws ContractNotFoundException  unknown contract or not the caller's
   * @throws DocumentNotFoundException  nothing generated yet
   */
  async openLatest(contractId: string, ownerId: string): Promise<DocumentDownload> {
    const contract = await this.contractsService.getOwned(contractId, ownerId);
    if (!contract.documentKey) {
      throw new DocumentNotFoundException(contractId);
    }

    const stream = await this.storage.download(contract.documentKey);
    return { stream, filename: `${toFilename(contract.title)}.pdf` };
  }

  /**
   * Re-hashes the stored PDF and compares it with the sha256 recorded when
   * it was generated.
   *
   * @throws DocumentNotFoundException  nothing generated yet
   */
  async verify(
    contractId: string,
    ownerId: string,
    now: Date = new Date(),
  ): Promise<DocumentVerificationDto> {
    const contract = await this.contractsService.getOwned(contractId, ownerId);
    if (!contract.documentKey || !contract.documentHash) {
      throw new DocumentNotFoundException(contractId);
    }

    const actualHash = await sha256Of(await this.storage.download(contract.documentKey));
    const valid = actualHash === contract.documentHash;
    if (!valid) {
      this.logger.warn(`Stored document ${contract.documentKey} does not match its recorded hash`);
    }

    return {
      contractId,
      documentKey: contract.documentKey,
      valid,
      documentHash: contract.documentHash,
      actualHash,
      verifiedAt: now.toISOString(),
    };
  }
}

async function sha256Of(stream: Readable): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of stream) {
    const data: unknown = chunk;
    hash.update(Buffer.isBuffer(data) ? data : String(data));
  }
  return hash.digest('hex');
}

/** Strips characters unsafe in a Content-Disposition filename. */
export function toFilename(title: string): string {
  const cleaned = title
    .replace(/[^a-zA-Z0-9._-]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 100);
  return cleaned || 'contract';
}
