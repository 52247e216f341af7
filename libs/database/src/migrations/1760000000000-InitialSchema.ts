import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial schema: users, contracts, contract_history, contract_versions, async_jobs.
 *
 * Hand-written to match the entity definitions; migration:generate needs a
 * live connection. PostgreSQL-specific (uuid_generate_v4, timestamptz, jsonb).
 */
export class InitialSchema1760000000000 implements MigrationInterface {
  name = 'InitialSchema1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    // ── Enum types ─────────────────────────────────────────
    await queryRunner.query(
      `CREATE TYPE "contracts_status_enum" AS ENUM ('DRAFT', 'GENERATED', 'SIGNING', 'SIGNED', 'CANCELLED')`,
    );
    await queryRunner.query(
      `CREATE TYPE "contract_history_from_status_enum" AS ENUM ('DRAFT', 'GENERATED', 'SIGNING', 'SIGNED', 'CANCELLED')`,
    );
    await queryRunner.query(
      `CREATE TYPE "contract_history_to_status_enum" AS ENUM ('DRAFT', 'GENERATED', 'SIGNING', 'SIGNED', 'CANCELLED')`,
    );
    await queryRunner.query(
      `CREATE TYPE "contract_versions_source_enum" AS ENUM ('AI', 'USER')`,
    );
    await queryRunner.query(
      `CREATE TYPE "async_jobs_kind_enum" AS ENUM ('PDF_GENERATION', 'AI_GENERATION')`,
    );
    await queryRunner.query(
      `CREATE TYPE "async_jobs_status_enum" AS ENUM ('PENDING', 'RUNNING', 'SUCCEEDED', 'FAILED')`,
    );

    // ── Users ──────────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "users" (
        "id"          varchar(128) NOT NULL,
        "email"       varchar(255) NOT NULL,
        "first_name"  varchar(100),
        "last_name"   varchar(100),
        "role"        varchar(20) NOT NULL DEFAULT 'USER',
        "is_active"   boolean NOT NULL DEFAULT true,
        "created_at"  TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"  TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_users" PRIMARY KEY ("id")
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_users_email" ON "users" ("email")`,
    );

    // ── Contracts ──────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "contracts" (
        "id"             uuid NOT NULL DEFAULT uuid_generate_v4(),
        "title"          varchar(500) NOT NULL,
        "contract_type"  varchar(100) NOT NULL,
        "template_id"    varchar(100) NOT NULL,
        "owner_id"       varchar(128) NOT NULL,
        "status"         "contracts_status_enum" NOT NULL DEFAULT 'DRAFT',
        "version"        integer NOT NULL DEFAULT 1,
        "document_key"   varchar(1024),
        "document_hash"  varchar(64),
        "signed_at"      TIMESTAMPTZ,
        "deleted_at"     TIMESTAMPTZ,
        "created_at"     TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"     TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_contracts" PRIMARY KEY ("id")
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_contracts_owner_id" ON "contracts" ("owner_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_contracts_owner_status" ON "contracts" ("owner_id", "status")`,
    );

    // ── Contract history ───────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "contract_history" (
        "id"           uuid NOT NULL DEFAULT uuid_generate_v4(),
        "contract_id"  uuid NOT NULL,
        "from_status"  "contract_history_from_status_enum" NOT NULL,
        "to_status"    "contract_history_to_status_enum" NOT NULL,
        "actor_id"     varchar(128) NOT NULL,
        "reason"       text,
        "created_at"   TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_contract_history" PRIMARY KEY ("id"),
        CONSTRAINT "FK_contract_history_contract" FOREIGN KEY ("contract_id")
          REFERENCES "contracts"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_contract_history_contract_created" ON "contract_history" ("contract_id", "created_at")`,
    );

    // ── Contract versions ──────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "contract_versions" (
        "id"           uuid NOT NULL DEFAULT uuid_generate_v4(),
        "contract_id"  uuid NOT NULL,
        "version"      integer NOT NULL,
        "content"      text NOT NULL,
        "source"       "contract_versions_source_enum" NOT NULL,
        "created_by"   varchar(128) NOT NULL,
        "created_at"   TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_contract_versions" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_contract_versions_contract_version" UNIQUE ("contract_id", "version"),
        CONSTRAINT "FK_contract_versions_contract" FOREIGN KEY ("contract_id")
          REFERENCES "contracts"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    // ── Async jobs ─────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "async_jobs" (
        "id"            uuid NOT NULL DEFAULT uuid_generate_v4(),
        "kind"          "async_jobs_kind_enum" NOT NULL,
        "status"        "async_jobs_status_enum" NOT NULL DEFAULT 'PENDING',
        "parameters"    jsonb NOT NULL DEFAULT '{}',
        "result"        jsonb,
        "error"         jsonb,
        "requested_by"  varchar(128) NOT NULL,
        "started_at"    TIMESTAMPTZ,
        "completed_at"  TIMESTAMPTZ,
        "created_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_async_jobs" PRIMARY KEY ("id")
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_async_jobs_requested_by" ON "async_jobs" ("requested_by")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_async_jobs_status_created" ON "async_jobs" ("status", "created_at")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    // Drop in reverse dependency order
    await queryRunner.query(`DROP TABLE IF EXISTS "async_jobs" CASCADE`);
    await queryRunner.query(`DROP TABLE IF EXISTS "contract_versions" CASCADE`);
    await queryRunner.query(`DROP TABLE IF EXISTS "contract_history" CASCADE`);
    await queryRunner.query(`DROP TABLE IF EXISTS "contracts" CASCADE`);
    await queryRunner.query(`DROP TABLE IF EXISTS "users" CASCADE`);

    await queryRunner.query(`DROP TYPE IF EXISTS "async_jobs_status_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "async_jobs_kind_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "contract_versions_source_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "contract_history_to_status_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "contract_history_from_status_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "contracts_status_enum"`);
  }
}
