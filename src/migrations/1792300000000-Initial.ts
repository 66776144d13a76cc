import { MigrationInterface, QueryRunner } from 'typeorm';

export class Initial1792300000000 implements MigrationInterface {
  name = 'Initial1792300000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
            CREATE TABLE "sources" (
                "id" SERIAL NOT NULL,
                "name" character varying(50) NOT NULL,
                CONSTRAINT "UQ_sources_name" UNIQUE ("name"),
                CONSTRAINT "PK_sources" PRIMARY KEY ("id")
            )
        `);
    await queryRunner.query(`
            CREATE TABLE "providers" (
                "id" SERIAL NOT NULL,
                "name" character varying(50) NOT NULL,
                CONSTRAINT "UQ_providers_name" UNIQUE ("name"),
                CONSTRAINT "PK_providers" PRIMARY KEY ("id")
            )
        `);
    await queryRunner.query(`
            CREATE TABLE "status_outcomes" (
                "code" integer NOT NULL,
                "description" character varying(300) NOT NULL,
                CONSTRAINT "PK_status_outcomes" PRIMARY KEY ("code")
            )
        `);
    await queryRunner.query(`
            CREATE TABLE "proxies" (
                "id" SERIAL NOT NULL,
                "address" character varying(100) NOT NULL,
                "source_id" integer NOT NULL,
                "provider_id" integer,
                "priority" integer NOT NULL DEFAULT 0,
                "blocked" boolean NOT NULL DEFAULT false,
                "usage_cooldown_sec" integer NOT NULL DEFAULT 30,
                "last_touched" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                CONSTRAINT "PK_proxies" PRIMARY KEY ("id")
            )
        `);
    await queryRunner.query(`
            CREATE INDEX "IDX_proxies_source_blocked_priority" ON "proxies" ("source_id", "blocked", "priority")
        `);
    await queryRunner.query(`
            CREATE INDEX "IDX_proxies_source_last_touched" ON "proxies" ("source_id", "last_touched")
        `);
    await queryRunner.query(`
            CREATE TABLE "usage_statistics" (
                "id" SERIAL NOT NULL,
                "proxy_id" integer NOT NULL,
                "status_code" integer NOT NULL,
                "counter" integer NOT NULL DEFAULT 0,
                "last_reported_at" TIMESTAMP WITH TIME ZONE NOT NULL,
                CONSTRAINT "UQ_usage_statistics_proxy_status" UNIQUE ("proxy_id", "status_code"),
                CONSTRAINT "PK_usage_statistics" PRIMARY KEY ("id")
            )
        `);
    await queryRunner.query(`
            CREATE TABLE "proxy_reports" (
                "id" SERIAL NOT NULL,
                "proxy_id" integer NOT NULL,
                "status_code" integer NOT NULL,
                "reported_at" TIMESTAMP WITH TIME ZONE NOT NULL,
                CONSTRAINT "PK_proxy_reports" PRIMARY KEY ("id")
            )
        `);
    await queryRunner.query(`
            CREATE INDEX "IDX_proxy_reports_proxy_reported_at" ON "proxy_reports" ("proxy_id", "reported_at")
        `);
    await queryRunner.query(`
            ALTER TABLE "proxies"
            ADD CONSTRAINT "FK_proxies_source" FOREIGN KEY ("source_id") REFERENCES "sources"("id") ON DELETE CASCADE ON UPDATE NO ACTION
        `);
    await queryRunner.query(`
            ALTER TABLE "proxies"
            ADD CONSTRAINT "FK_proxies_provider" FOREIGN KEY ("provider_id") REFERENCES "providers"("id") ON DELETE SET NULL ON UPDATE NO ACTION
        `);
    await queryRunner.query(`
            ALTER TABLE "usage_statistics"
            ADD CONSTRAINT "FK_usage_statistics_proxy" FOREIGN KEY ("proxy_id") REFERENCES "proxies"("id") ON DELETE CASCADE ON UPDATE NO ACTION
        `);
    await queryRunner.query(`
            ALTER TABLE "usage_statistics"
            ADD CONSTRAINT "FK_usage_statistics_status" FOREIGN KEY ("status_code") REFERENCES "status_outcomes"("code") ON DELETE NO ACTION ON UPDATE NO ACTION
        `);
    await queryRunner.query(`
            ALTER TABLE "proxy_reports"
            ADD CONSTRAINT "FK_proxy_reports_proxy" FOREIGN KEY ("proxy_id") REFERENCES "proxies"("id") ON DELETE CASCADE ON UPDATE NO ACTION
        `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
            DROP TABLE "proxy_reports"
        `);
    await queryRunner.query(`
            DROP TABLE "usage_statistics"
        `);
    await queryRunner.query(`
            DROP TABLE "proxies"
        `);
    await queryRunner.query(`
            DROP TABLE "status_outcomes"
        `);
    await queryRunner.query(`
            DROP TABLE "providers"
        `);
    await queryRunner.query(`
            DROP TABLE "sources"
        `);
  }
}
