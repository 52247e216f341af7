export enum AuditEventType {
  CONTRACT_CREATED = 'CONTRACT_CREATED',
  CONTENT_SAVED = 'CONTENT_SAVED',
  STATUS_CHANGED = 'STATUS_CHANGED',
  PARTY_ADDED = 'PARTY_ADDED',
  PARTY_SIGNED = 'PARTY_SIGNED',
}

export class AuditEventDto {
  /** `<eventType>:<source row id>`, stable across calls */
  id!: string;
  eventType!: AuditEventType;
  /** Firebase uid, or null where the record keeps no actor */
  actor!: string | null;
  timestamp!: string;
  details!: Record<string, unknown>;
}

export class AuditTrailDto {
  contractId!: string;
  /** Oldest first */
  events!: AuditEventDto[];
  generatedAt!: string;
}
