import { Injectable, Logger } from '@nestjs/common';
import { ContractsService } from '../contracts/contracts.service';
import type { ContractActivity } from '../contracts/contracts.service';
import { PdfRenderer } from '../documents/rendering/pdf-renderer';
import { toFilename } from '../documents/documents.service';
import { escapeHtml } from '../ai/generators/template-contract-generator';
import { AuditEventDto, AuditEventType, AuditTrailDto } from './dto/audit-trail.dto';

export interface AuditExport {
  body: Buffer;
  filename: string;
}

/**
 * AuditService - the contract's audit trail, assembled from what the
 * lifecycle already persists: the contract row, content versions, status
 * history and parties. Nothing here writes.
 */
@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(
    private readonly contractsService: ContractsService,
    private readonly renderer: PdfRenderer,
  ) {}

  async trail(
    contractId: string,
    ownerId: string,
    now: Date = new Date(),
  ): Promise<AuditTrailDto> {
    const activity = await this.contractsService.activity(contractId, ownerId);
    return {
      contractId,
      events: toEvents(activity),
      generatedAt: now.toISOString(),
    };
  }

  /** The trail as a PDF table of events. */
  async export(contractId: string, ownerId: string, now: Date = new Date()): Promise<AuditExport> {
    const activity = await this.contractsService.activity(contractId, ownerId);
    const events = toEvents(activity);

    const lines = events.map(
      (event) =>
        `<li>${escapeHtml(event.timestamp)}: ${event.eventType} by ${escapeHtml(event.actor ?? 'System')}</li>`,
    );
    const content = [
      `<h1>Audit trail</h1>`,
      `<p>Contract: ${escapeHtml(activity.contract.title)} (${contractId})</p>`,
      `<p>Generated: ${now.toISOString()}</p>`,
      `<p>Total events: ${events.length}</p>`,
      `<hr>`,
      `<ul>${lines.join('')}</ul>`,
    ].join('');

    const bytes = await this.renderer.render({ title: 'Audit trail', content });
    this.logger.log(`Exported audit trail of contract ${contractId} (${events.length} events)`);
    return {
      body: Buffer.from(bytes),
      filename: `audit-${toFilename(activity.contract.title)}.pdf`,
    };
  }
}

function toEvents({ contract, history, versions, parties }: ContractActivity): AuditEventDto[] {
  const events: AuditEventDto[] = [
    {
      id: `${AuditEventType.CONTRACT_CREATED}:${contract.id}`,
      eventType: AuditEventType.CONTRACT_CREATED,
      actor: contract.ownerId,
      timestamp: contract.createdAt.toISOString(),
      details: { title: contract.title, templateId: contract.templateId },
    },
  ];

  for (const version of versions) {
    events.push({
      id: `${AuditEventType.CONTENT_SAVED}:${version.id}`,
      eventType: AuditEventType.CONTENT_SAVED,
      actor: version.createdBy,
      timestamp: version.createdAt.toISOString(),
      details: { version: version.version, source: version.source },
    });
  }

  for (const entry of history) {
    events.push({
      id: `${AuditEventType.STATUS_CHANGED}:${entry.id}`,
      eventType: AuditEventType.STATUS_CHANGED,
      actor: entry.actorId,
      timestamp: entry.createdAt.toISOString(),
      details: {
        fromStatus: entry.fromStatus,
        toStatus: entry.toStatus,
        ...(entry.reason ? { reason: entry.reason } : {}),
      },
    });
  }

  for (const party of parties) {
    events.push({
      id: `${AuditEventType.PARTY_ADDED}:${party.id}`,
      eventType: AuditEventType.PARTY_ADDED,
      actor: contract.ownerId,
      timestamp: party.createdAt.toISOString(),
      details: { role: party.role, email: party.email },
    });
    if (party.signedAt) {
      events.push({
        id: `${AuditEventType.PARTY_SIGNED}:${party.id}`,
        eventType: AuditEventType.PARTY_SIGNED,
        actor: null,
        timestamp: party.signedAt.toISOString(),
        details: { role: party.role, email: party.email },
      });
    }
  }

  // Stable: same-instant events keep the order above
  return events.sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
}
