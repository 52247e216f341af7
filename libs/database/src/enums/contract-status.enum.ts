/**
 * Lifecycle status of a contract.
 *
 * Transitions:
 *   DRAFT     → GENERATED | CANCELLED
 *   GENERATED → SIGNING | GENERATED | CANCELLED
 *   SIGNING   → SIGNED | CANCELLED
 *
 * SIGNED and CANCELLED are terminal.
 */
export enum ContractStatus {
  /** Created, no generated content yet */
  DRAFT = 'DRAFT',

  /** Content produced (AI generation); may be regenerated */
  GENERATED = 'GENERATED',

  /** Sent out for signatures */
  SIGNING = 'SIGNING',

  /** All parties signed */
  SIGNED = 'SIGNED',

  /** Abandoned before completion (reason recorded in history) */
  CANCELLED = 'CANCELLED',
}
