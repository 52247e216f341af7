// ── Entities ────────────────────────────────────────────────
export { User } from './entities/user.entity';
export { Contract } from './entities/contract.entity';
export { ContractHistoryEntry } from './entities/contract-history.entity';
export { ContractVersion } from './entities/contract-version.entity';
export { ContractParty } from './entities/contract-party.entity';
export { AsyncJob } from './entities/async-job.entity';
export type { JobError } from './entities/async-job.entity';

// ── Enums ───────────────────────────────────────────────────
export { ContractStatus } from './enums/contract-status.enum';
export { ContentSource } from './enums/content-source.enum';
export { JobKind } from './enums/job-kind.enum';
export { JobStatus } from './enums/job-status.enum';
export { PartyRole } from './enums/party-role.enum';
export { SignatureStatus } from './enums/signature-status.enum';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';
