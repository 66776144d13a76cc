import { STATUS_CATALOG } from '../modules/health/status-catalog';
import { MigrationInterface, QueryRunner } from 'typeorm';

export class SeedStatusOutcomes1792300100000 implements MigrationInterface {
  name = 'SeedStatusOutcomes1792300100000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    for (const { code, description } of STATUS_CATALOG) {
      await queryRunner.query(
        `
            INSERT INTO "status_outcomes" ("code", "description")
            VALUES ($1, $2)
            ON CONFLICT ("code") DO UPDATE SET "description" = EXCLUDED."description"
        `,
        [code, description],
      );
    }
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `
            DELETE FROM "status_outcomes" WHERE "code" = ANY($1)
        `,
      [STATUS_CATALOG.map(({ code }) => code)],
    );
  }
}
