import { Test } from '@nestjs/testing';
import { ContentSource, ContractStatus, PartyRole } from '@clm/database';
import { AuditService } from './audit.service';
import { AuditEventType } from './dto/audit-trail.dto';
import { ContractsService } from '../contracts/contracts.service';
import { ContractsRepository } from '../contracts/repositories/contracts.repository';
import { ContractNotFoundException } from '../contracts/exceptions/contract.exceptions';
import { TemplatesService } from '../templates/templates.service';
import { PdfRenderer } from '../documents/rendering/pdf-renderer';
import { PdfLibRenderer } from '../documents/rendering/pdf-lib-renderer';
import { InMemoryContractsRepository } from '../../test/support/in-memory-contracts.repository';

const OWNER = 'alice-uid';
const generatedAt = new Date('2026-05-04T12:00:00Z');

describe('AuditService', () => {
  let audit: AuditService;
  let contracts: ContractsService;
  let repository: InMemoryContractsRepository;
  let renderer: PdfLibRenderer;

  beforeEach(async () => {
    repository = new InMemoryContractsRepository();
    renderer = new PdfLibRenderer();

    const moduleRef = await Test.createTestingModule({
      providers: [
        AuditService,
        ContractsService,
        TemplatesService,
        { provide: ContractsRepository, useValue: repository },
        { provide: PdfRenderer, useValue: renderer },
      ],
    }).compile();

    audit = moduleRef.get(AuditService);
    contracts = moduleRef.get(ContractsService);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  /** A contract edited, generated, given a signer, then cancelled, five minutes apart. */
  const buildHistory = async (): Promise<string> => {
    jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate'] });
    const at = (time: string) => jest.setSystemTime(new Date(`2026-05-04T${time}:00Z`));

    at('10:00');
    const { id } = await contracts.create(OWNER, {
      title: 'Supplier NDA',
      templateId: 'tpl_nda_v1',
      contractType: 'NDA',
    });
    at('10:05');
    await contracts.updateContent(id, OWNER, { content: '<p>Draft</p>' });
    at('10:10');
    await contracts.updateContent(id, OWNER, { content: '<p>Generated</p>', source: ContentSource.AI });
    at('10:15');
    const party = await contracts.addParty(id, OWNER, {
      role: PartyRole.GUEST,
      name: 'Bob',
      email: 'bob@example.com',
    });
    repository.markPartySigned(party.id, new Date('2026-05-04T10:20:00Z'));
    at('10:25');
    await contracts.transition(id, ContractStatus.CANCELLED, OWNER, { reason: 'Deal fell through' });

    jest.useRealTimers();
    return id;
  };

  describe('trail', () => {
    it('merges the recorded activity oldest first', async () => {
      const id = await buildHistory();

      const trail = await audit.trail(id, OWNER, generatedAt);

      expect(trail.contractId).toBe(id);
      expect(trail.generatedAt).toBe('2026-05-04T12:00:00.000Z');
      expect(trail.events.map((e) => [e.eventType, e.timestamp, e.actor])).toEqual([
        [AuditEventType.CONTRACT_CREATED, '2026-05-04T10:00:00.000Z', OWNER],
        [AuditEventType.CONTENT_SAVED, '2026-05-04T10:05:00.000Z', OWNER],
        [AuditEventType.CONTENT_SAVED, '2026-05-04T10:10:00.000Z', OWNER],
        [AuditEventType.STATUS_CHANGED, '2026-05-04T10:10:00.000Z', OWNER],
        [AuditEventType.PARTY_ADDED, '2026-05-04T10:15:00.000Z', OWNER],
        [AuditEventType.PARTY_SIGNED, '2026-05-04T10:20:00.000Z', null],
        [AuditEventType.STATUS_CHANGED, '2026-05-04T10:25:00.000Z', OWNER],
      ]);
    });

    it('carries the details of each record', async () => {
      const id = await buildHistory();

      const { events } = await audit.trail(id, OWNER, generatedAt);

      expect(events[0].details).toEqual({ title: 'Supplier NDA', templateId: 'tpl_nda_v1' });
      expect(events[2].details).toEqual({ version: 2, source: ContentSource.AI });
      expect(events[3].details).toEqual({
        fromStatus: ContractStatus.DRAFT,
        toStatus: ContractStatus.GENERATED,
      });
      expect(events[4].details).toEqual({ role: PartyRole.GUEST, email: 'bob@example.com' });
      expect(events[6].details).toEqual({
        fromStatus: ContractStatus.GENERATED,
        toStatus: ContractStatus.CANCELLED,
        reason: 'Deal fell through',
      });
      expect(events[0].id).toBe(`${AuditEventType.CONTRACT_CREATED}:${id}`);
    });

    it('hides contracts of other users', async () => {
      const { id } = await contracts.create(OWNER, {
        title: 'Private',
        templateId: 'tpl_nda_v1',
        contractType: 'NDA',
      });

      await expect(audit.trail(id, 'mallory-uid')).rejects.toBeInstanceOf(
        ContractNotFoundException,
      );
    });
  });

  describe('export', () => {
    it('renders one line per event into a PDF', async () => {
      const id = await buildHistory();
      const render = jest.spyOn(renderer, 'render');

      const { body, filename } = await audit.export(id, OWNER, generatedAt);

      expect(filename).toBe('audit-Supplier-NDA.pdf');
      expect(body.subarray(0, 5).toString('latin1')).toBe('%PDF-');
      const [{ content }] = render.mock.calls[0];
      expect(content).toContain('<p>Total events: 7</p>');
      expect(content).toContain(
        '<li>2026-05-04T10:20:00.000Z: PARTY_SIGNED by System</li>',
      );
    });
  });
});
