import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Contract parties, plus the AI_REGENERATION job kind.
 */
export class ContractParties1760500000000 implements MigrationInterface {
  name = 'ContractParties1760500000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `ALTER TYPE "async_jobs_kind_enum" ADD VALUE IF NOT EXISTS 'AI_REGENERATION'`,
    );

    await queryRunner.query(
      `CREATE TYPE "contract_parties_role_enum" AS ENUM ('HOST', 'GUEST', 'WITNESS')`,
    );
    await queryRunner.query(
      `CREATE TYPE "contract_parties_signature_status_enum" AS ENUM ('PENDING', 'INVITED', 'SIGNED')`,
    );

    await queryRunner.query(`
      CREATE TABLE "contract_parties" (
        "id"                uuid NOT NULL DEFAULT uuid_generate_v4(),
        "contract_id"       uuid NOT NULL,
        "role"              "contract_parties_role_enum" NOT NULL,
        "name"              varchar(255) NOT NULL,
        "email"             varchar(255) NOT NULL,
        "signature_status"  "contract_parties_signature_status_enum" NOT NULL DEFAULT 'PENDING',
        "signed_at"         TIMESTAMPTZ,
        "signing_order"     integer NOT NULL DEFAULT 1,
        "created_at"        TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_contract_parties" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_contract_parties_contract_email" UNIQUE ("contract_id", "email"),
        CONSTRAINT "CHK_contract_parties_signing_order" CHECK ("signing_order" > 0),
        CONSTRAINT "FK_contract_parties_contract" FOREIGN KEY ("contract_id")
          REFERENCES "contracts"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "contract_parties" CASCADE`);
    await queryRunner.query(`DROP TYPE IF EXISTS "contract_parties_signature_status_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "contract_parties_role_enum"`);

    // Postgres cannot drop an enum value; rebuild the type without it
    await queryRunner.query(`DELETE FROM "async_jobs" WHERE "kind" = 'AI_REGENERATION'`);
    await queryRunner.query(
      `ALTER TYPE "async_jobs_kind_enum" RENAME TO "async_jobs_kind_enum_old"`,
    );
    await queryRunner.query(
      `CREATE TYPE "async_jobs_kind_enum" AS ENUM ('PDF_GENERATION', 'AI_GENERATION')`,
    );
    await queryRunner.query(
      `ALTER TABLE "async_jobs" ALTER COLUMN "kind" TYPE "async_jobs_kind_enum" USING "kind"::text::"async_jobs_kind_enum"`,
    );
    await queryRunner.query(`DROP TYPE "async_jobs_kind_enum_old"`);
  }
}
