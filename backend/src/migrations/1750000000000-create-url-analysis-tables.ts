import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateUrlAnalysisTables1750000000000 implements MigrationInterface {
  name = 'CreateUrlAnalysisTables1750000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    // gen_random_uuid() is core from PostgreSQL 13; older servers need pgcrypto
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "pgcrypto"`);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "urls" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "url" text NOT NULL,
        "domain" text NOT NULL,
        "submitted_at" TIMESTAMP WITH TIME ZONE DEFAULT now(),
        "source" text DEFAULT 'manual',
        "created_at" TIMESTAMP WITH TIME ZONE DEFAULT now(),
        "updated_at" TIMESTAMP WITH TIME ZONE DEFAULT now(),
        "url_hash" text,
        CONSTRAINT "urls_pkey" PRIMARY KEY ("id"),
        CONSTRAINT "urls_url_key" UNIQUE ("url")
      )
    `);

    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "idx_urls_domain" ON "urls" ("domain")
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "idx_urls_submitted_at" ON "urls" ("submitted_at" DESC)
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "analysis_results" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "url_id" uuid NOT NULL,
        "analysis_date" TIMESTAMP WITH TIME ZONE DEFAULT now(),
        "is_phishing" boolean NOT NULL,
        "risk_score" integer NOT NULL,
        "confidence_level" text NOT NULL,
        "virustotal_result" jsonb,
        "heuristic_result" jsonb,
        "analysis_duration_ms" integer,
        "sources_checked" text[],
        "error_log" text,
        "created_at" TIMESTAMP WITH TIME ZONE DEFAULT now(),
        CONSTRAINT "analysis_results_pkey" PRIMARY KEY ("id"),
        CONSTRAINT "analysis_results_risk_score_check" CHECK ("risk_score" >= 0 AND "risk_score" <= 100),
        CONSTRAINT "analysis_results_confidence_level_check" CHECK ("confidence_level" IN ('high', 'medium', 'low')),
        CONSTRAINT "analysis_results_url_id_fkey" FOREIGN KEY ("url_id")
          REFERENCES "urls"("id") ON DELETE CASCADE
      )
    `);

    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "idx_analysis_results_url_id" ON "analysis_results" ("url_id")
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "idx_analysis_results_analysis_date" ON "analysis_results" ("analysis_date" DESC)
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "idx_analysis_results_is_phishing" ON "analysis_results" ("is_phishing")
    `);

    // A column default cannot reference another column, so url_hash is
    // filled in on insert when the writer leaves it empty
    await queryRunner.query(`
      CREATE OR REPLACE FUNCTION "urls_fill_url_hash"() RETURNS trigger AS $$
      BEGIN
        NEW."url_hash" := COALESCE(NEW."url_hash", md5(NEW."url"));
        RETURN NEW;
      END;
      $$ LANGUAGE plpgsql
    `);
    await queryRunner.query(`
      CREATE TRIGGER "urls_fill_url_hash"
        BEFORE INSERT ON "urls"
        FOR EACH ROW EXECUTE FUNCTION "urls_fill_url_hash"()
    `);

    await queryRunner.query(`
      CREATE OR REPLACE FUNCTION "urls_touch_updated_at"() RETURNS trigger AS $$
      BEGIN
        NEW."updated_at" := now();
        RETURN NEW;
      END;
      $$ LANGUAGE plpgsql
    `);
    await queryRunner.query(`
      CREATE TRIGGER "urls_touch_updated_at"
        BEFORE UPDATE ON "urls"
        FOR EACH ROW EXECUTE FUNCTION "urls_touch_updated_at"()
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `DROP TRIGGER IF EXISTS "urls_touch_updated_at" ON "urls"`,
    );
    await queryRunner.query(`DROP FUNCTION IF EXISTS "urls_touch_updated_at"()`);
    await queryRunner.query(
      `DROP TRIGGER IF EXISTS "urls_fill_url_hash" ON "urls"`,
    );
    await queryRunner.query(`DROP FUNCTION IF EXISTS "urls_fill_url_hash"()`);
    await queryRunner.query(
      `DROP INDEX IF EXISTS "idx_analysis_results_is_phishing"`,
    );
    await queryRunner.query(
      `DROP INDEX IF EXISTS "idx_analysis_results_analysis_date"`,
    );
    await queryRunner.query(`DROP INDEX IF EXISTS "idx_analysis_results_url_id"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "analysis_results"`);
    await queryRunner.query(`DROP INDEX IF EXISTS "idx_urls_submitted_at"`);
    await queryRunner.query(`DROP INDEX IF EXISTS "idx_urls_domain"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "urls"`);
  }
}
