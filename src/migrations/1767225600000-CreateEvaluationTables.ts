import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateEvaluationTables1767225600000 implements MigrationInterface {
    name = 'CreateEvaluationTables1767225600000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "pgcrypto"`);

        await queryRunner.query(`CREATE TABLE "deadline_batches" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "name" character varying(150) NOT NULL, "description" text, "appliesFrom" TIMESTAMP WITH TIME ZONE, "appliesUntil" TIMESTAMP WITH TIME ZONE, "isActive" boolean NOT NULL DEFAULT true, "createdBy" uuid NOT NULL, "createdAt" TIMESTAMP NOT NULL DEFAULT now(), "updatedAt" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_deadline_batches" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE UNIQUE INDEX "IDX_deadline_batches_name" ON "deadline_batches" ("name")`);

        await queryRunner.query(`CREATE TABLE "projects" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "title" character varying(300) NOT NULL, "supervisorId" uuid, "leaderId" uuid, "memberIds" text NOT NULL DEFAULT '', "deadlineBatchId" uuid, "createdAt" TIMESTAMP NOT NULL DEFAULT now(), "updatedAt" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_projects" PRIMARY KEY ("id"))`);
        await queryRunner.query(`ALTER TABLE "projects" ADD CONSTRAINT "FK_projects_deadline_batch" FOREIGN KEY ("deadlineBatchId") REFERENCES "deadline_batches"("id") ON DELETE SET NULL`);

        await queryRunner.query(`CREATE TABLE "document_types" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "code" character varying(50) NOT NULL, "title" character varying(200) NOT NULL, "description" text, "supervisorWeight" integer NOT NULL DEFAULT 20, "committeeWeight" integer NOT NULL DEFAULT 80, "displayOrder" integer NOT NULL DEFAULT 0, "isActive" boolean NOT NULL DEFAULT true, "createdAt" TIMESTAMP NOT NULL DEFAULT now(), "updatedAt" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_document_types" PRIMARY KEY ("id"), CONSTRAINT "CHK_document_types_weights" CHECK ("supervisorWeight" BETWEEN 0 AND 100 AND "committeeWeight" BETWEEN 0 AND 100))`);
        await queryRunner.query(`CREATE UNIQUE INDEX "IDX_document_types_code" ON "document_types" ("code")`);

        await queryRunner.query(`CREATE TABLE "project_deadlines" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "batchId" uuid NOT NULL, "documentTypeId" uuid NOT NULL, "deadlineDate" TIMESTAMP WITH TIME ZONE NOT NULL, "sortOrder" integer NOT NULL, "reminderSentAt" TIMESTAMP WITH TIME ZONE, "passedProcessedAt" TIMESTAMP WITH TIME ZONE, "createdAt" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_project_deadlines_batch_type" UNIQUE ("batchId", "documentTypeId"), CONSTRAINT "PK_project_deadlines" PRIMARY KEY ("id"))`);
        await queryRunner.query(`ALTER TABLE "project_deadlines" ADD CONSTRAINT "FK_project_deadlines_batch" FOREIGN KEY ("batchId") REFERENCES "deadline_batches"("id") ON DELETE CASCADE`);
        await queryRunner.query(`ALTER TABLE "project_deadlines" ADD CONSTRAINT "FK_project_deadlines_document_type" FOREIGN KEY ("documentTypeId") REFERENCES "document_types"("id") ON DELETE RESTRICT`);

        await queryRunner.query(`CREATE TYPE "public"."document_submissions_status_enum" AS ENUM('DRAFT', 'PENDING_REVIEW', 'APPROVED', 'REVISION_REQUESTED', 'LOCKED', 'EVALUATED')`);
        await queryRunner.query(`CREATE TABLE "document_submissions" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "projectId" uuid NOT NULL, "documentTypeId" uuid NOT NULL, "version" integer NOT NULL, "supersedesId" uuid, "fileId" character varying(200) NOT NULL, "fileUrl" text NOT NULL, "uploadedBy" uuid NOT NULL, "status" "public"."document_submissions_status_enum" NOT NULL DEFAULT 'PENDING_REVIEW', "isFinal" boolean NOT NULL DEFAULT false, "finalizedAt" TIMESTAMP WITH TIME ZONE, "isLate" boolean NOT NULL DEFAULT false, "comments" text, "reviewFeedback" text, "reviewedBy" uuid, "reviewedAt" TIMESTAMP WITH TIME ZONE, "lockedBy" uuid, "lockedAt" TIMESTAMP WITH TIME ZONE, "uploadedAt" TIMESTAMP WITH TIME ZONE NOT NULL, "updatedAt" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_document_submissions_version" UNIQUE ("projectId", "documentTypeId", "version"), CONSTRAINT "PK_document_submissions" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_document_submissions_pair" ON "document_submissions" ("projectId", "documentTypeId")`);
        await queryRunner.query(`CREATE INDEX "IDX_document_submissions_status" ON "document_submissions" ("status")`);
        await queryRunner.query(`ALTER TABLE "document_submissions" ADD CONSTRAINT "FK_document_submissions_project" FOREIGN KEY ("projectId") REFERENCES "projects"("id") ON DELETE CASCADE`);
        await queryRunner.query(`ALTER TABLE "document_submissions" ADD CONSTRAINT "FK_document_submissions_document_type" FOREIGN KEY ("documentTypeId") REFERENCES "document_types"("id") ON DELETE RESTRICT`);
        await queryRunner.query(`ALTER TABLE "document_submissions" ADD CONSTRAINT "FK_document_submissions_supersedes" FOREIGN KEY ("supersedesId") REFERENCES "document_submissions"("id") ON DELETE SET NULL`);

        await queryRunner.query(`CREATE TABLE "supervisor_marks" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "submissionId" uuid NOT NULL, "supervisorId" uuid NOT NULL, "score" numeric(5,2) NOT NULL, "comments" text, "createdAt" TIMESTAMP NOT NULL DEFAULT now(), "updatedAt" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_supervisor_marks_submission" UNIQUE ("submissionId"), CONSTRAINT "PK_supervisor_marks" PRIMARY KEY ("id"), CONSTRAINT "CHK_supervisor_marks_score" CHECK ("score" BETWEEN 0 AND 100))`);
        await queryRunner.query(`ALTER TABLE "supervisor_marks" ADD CONSTRAINT "FK_supervisor_marks_submission" FOREIGN KEY ("submissionId") REFERENCES "document_submissions"("id") ON DELETE CASCADE`);

        await queryRunner.query(`CREATE TABLE "evaluation_marks" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "submissionId" uuid NOT NULL, "evaluatorId" uuid NOT NULL, "score" numeric(5,2) NOT NULL, "comments" text, "isFinal" boolean NOT NULL DEFAULT false, "finalizedAt" TIMESTAMP WITH TIME ZONE, "createdAt" TIMESTAMP NOT NULL DEFAULT now(), "updatedAt" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_evaluation_marks_evaluator" UNIQUE ("submissionId", "evaluatorId"), CONSTRAINT "PK_evaluation_marks" PRIMARY KEY ("id"), CONSTRAINT "CHK_evaluation_marks_score" CHECK ("score" BETWEEN 0 AND 100))`);
        await queryRunner.query(`CREATE INDEX "IDX_evaluation_marks_submission" ON "evaluation_marks" ("submissionId")`);
        await queryRunner.query(`ALTER TABLE "evaluation_marks" ADD CONSTRAINT "FK_evaluation_marks_submission" FOREIGN KEY ("submissionId") REFERENCES "document_submissions"("id") ON DELETE CASCADE`);

        await queryRunner.query(`CREATE TABLE "final_results" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "projectId" uuid NOT NULL, "totalScore" numeric(7,2) NOT NULL, "breakdown" jsonb NOT NULL, "released" boolean NOT NULL DEFAULT false, "releasedAt" TIMESTAMP WITH TIME ZONE, "releasedBy" uuid, "computedBy" uuid NOT NULL, "computedAt" TIMESTAMP WITH TIME ZONE NOT NULL, "createdAt" TIMESTAMP NOT NULL DEFAULT now(), "updatedAt" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_final_results_project" UNIQUE ("projectId"), CONSTRAINT "PK_final_results" PRIMARY KEY ("id"))`);
        await queryRunner.query(`ALTER TABLE "final_results" ADD CONSTRAINT "FK_final_results_project" FOREIGN KEY ("projectId") REFERENCES "projects"("id") ON DELETE CASCADE`);

        await queryRunner.query(`CREATE TYPE "public"."notifications_priority_enum" AS ENUM('low', 'medium', 'high')`);
        await queryRunner.query(`CREATE TYPE "public"."notifications_recipientrole_enum" AS ENUM('STUDENT', 'SUPERVISOR', 'EVALUATION_COMMITTEE', 'FYP_COMMITTEE', 'ADMIN', 'SYSTEM')`);
        await queryRunner.query(`CREATE TABLE "notifications" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "title" character varying(200) NOT NULL, "message" text NOT NULL, "type" character varying(50) NOT NULL, "priority" "public"."notifications_priority_enum" NOT NULL DEFAULT 'medium', "recipientUserId" uuid, "recipientRole" "public"."notifications_recipientrole_enum", "projectId" uuid, "read" boolean NOT NULL DEFAULT false, "readAt" TIMESTAMP WITH TIME ZONE, "metadata" jsonb, "createdAt" TIMESTAMP NOT NULL DEFAULT now(), "updatedAt" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_notifications" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_notifications_recipient_user" ON "notifications" ("recipientUserId")`);

        await queryRunner.query(`CREATE TYPE "public"."logs_level_enum" AS ENUM('info', 'warn', 'error')`);
        await queryRunner.query(`CREATE TABLE "logs" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "action" character varying(100) NOT NULL, "module" character varying(50) NOT NULL, "level" "public"."logs_level_enum" NOT NULL DEFAULT 'info', "performedBy" jsonb, "entityId" uuid, "entityType" character varying(50), "details" jsonb, "requestId" character varying(64), "ipAddress" character varying(64), "userAgent" character varying(500), "timestamp" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_logs" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_logs_entity" ON "logs" ("entityId")`);

        await queryRunner.query(`CREATE TABLE "system_settings" ("key" character varying(100) NOT NULL, "value" text NOT NULL, "description" text, "updatedAt" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_system_settings" PRIMARY KEY ("key"))`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP TABLE "system_settings"`);
        await queryRunner.query(`DROP TABLE "logs"`);
        await queryRunner.query(`DROP TYPE "public"."logs_level_enum"`);
        await queryRunner.query(`DROP TABLE "notifications"`);
        await queryRunner.query(`DROP TYPE "public"."notifications_recipientrole_enum"`);
        await queryRunner.query(`DROP TYPE "public"."notifications_priority_enum"`);
        await queryRunner.query(`DROP TABLE "final_results"`);
        await queryRunner.query(`DROP TABLE "evaluation_marks"`);
        await queryRunner.query(`DROP TABLE "supervisor_marks"`);
        await queryRunner.query(`DROP TABLE "document_submissions"`);
        await queryRunner.query(`DROP TYPE "public"."document_submissions_status_enum"`);
        await queryRunner.query(`DROP TABLE "project_deadlines"`);
        await queryRunner.query(`DROP TABLE "document_types"`);
        await queryRunner.query(`DROP TABLE "projects"`);
        await queryRunner.query(`DROP TABLE "deadline_batches"`);
    }

}
