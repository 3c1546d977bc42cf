import { MigrationInterface, QueryRunner } from "typeorm";

export class InitGlassBoxSchema1760000000000 implements MigrationInterface {
    name = 'InitGlassBoxSchema1760000000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TYPE "public"."trace_status_enum" AS ENUM('running', 'completed', 'failed', 'cancelled')`);
        await queryRunner.query(`CREATE TYPE "public"."step_type_enum" AS ENUM('thought', 'tool_call', 'tool_result', 'response')`);
        await queryRunner.query(`CREATE TABLE "agents" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "name" character varying(120) NOT NULL, "slug" character varying(120) NOT NULL, "description" text, "system_prompt" text NOT NULL, "model_config" jsonb NOT NULL DEFAULT '{}'::jsonb, "is_active" boolean NOT NULL DEFAULT true, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "UQ_agents_slug" UNIQUE ("slug"), CONSTRAINT "PK_agents_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE TABLE "sessions" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "user_id" character varying(120) NOT NULL, "agent_id" uuid NOT NULL, "context_data" jsonb NOT NULL DEFAULT '{}'::jsonb, "is_active" boolean NOT NULL DEFAULT true, "last_active_at" TIMESTAMP WITH TIME ZONE NOT NULL, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_sessions_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_sessions_user_id" ON "sessions" ("user_id")`);
        await queryRunner.query(`CREATE TABLE "traces" ("id" uuid NOT NULL, "session_id" uuid NOT NULL, "agent_id" uuid NOT NULL, "user_input" text NOT NULL, "final_output" text, "run_name" character varying(200), "total_tokens" integer NOT NULL DEFAULT 0, "total_cost" numeric(12,6) NOT NULL DEFAULT 0, "latency_ms" integer NOT NULL DEFAULT 0, "status" "public"."trace_status_enum" NOT NULL DEFAULT 'running', "is_successful" boolean NOT NULL DEFAULT false, "error_kind" character varying(40), "error_message" text, "system_prompt_snapshot" text, "model_config_snapshot" jsonb, "replayed_from_trace_id" uuid, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL, "completed_at" TIMESTAMP WITH TIME ZONE, CONSTRAINT "PK_traces_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_traces_session_created" ON "traces" ("session_id", "created_at")`);
        await queryRunner.query(`CREATE INDEX "IDX_traces_status" ON "traces" ("status")`);
        await queryRunner.query(`CREATE TABLE "trace_steps" ("id" uuid NOT NULL DEFAULT gen_random_uuid(), "trace_id" uuid NOT NULL, "sequence_order" integer NOT NULL, "step_type" "public"."step_type_enum" NOT NULL, "step_name" character varying(120), "input_payload" jsonb, "output_payload" jsonb, "latency_ms" integer NOT NULL DEFAULT 0, "tokens" integer NOT NULL DEFAULT 0, "cost_usd" numeric(12,6) NOT NULL DEFAULT 0, "is_error" boolean NOT NULL DEFAULT false, "error_message" text, "started_at" TIMESTAMP WITH TIME ZONE NOT NULL, "completed_at" TIMESTAMP WITH TIME ZONE, CONSTRAINT "UQ_trace_steps_trace_sequence" UNIQUE ("trace_id", "sequence_order"), CONSTRAINT "PK_trace_steps_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`ALTER TABLE "sessions" ADD CONSTRAINT "FK_sessions_agent_id" FOREIGN KEY ("agent_id") REFERENCES "agents"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "traces" ADD CONSTRAINT "FK_traces_session_id" FOREIGN KEY ("session_id") REFERENCES "sessions"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "traces" ADD CONSTRAINT "FK_traces_agent_id" FOREIGN KEY ("agent_id") REFERENCES "agents"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "trace_steps" ADD CONSTRAINT "FK_trace_steps_trace_id" FOREIGN KEY ("trace_id") REFERENCES "traces"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "trace_steps" DROP CONSTRAINT "FK_trace_steps_trace_id"`);
        await queryRunner.query(`ALTER TABLE "traces" DROP CONSTRAINT "FK_traces_agent_id"`);
        await queryRunner.query(`ALTER TABLE "traces" DROP CONSTRAINT "FK_traces_session_id"`);
        await queryRunner.query(`ALTER TABLE "sessions" DROP CONSTRAINT "FK_sessions_agent_id"`);
        await queryRunner.query(`DROP TABLE "trace_steps"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_traces_status"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_traces_session_created"`);
        await queryRunner.query(`DROP TABLE "traces"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_sessions_user_id"`);
        await queryRunner.query(`DROP TABLE "sessions"`);
        await queryRunner.query(`DROP TABLE "agents"`);
        await queryRunner.query(`DROP TYPE "public"."step_type_enum"`);
        await queryRunner.query(`DROP TYPE "public"."trace_status_enum"`);
    }

}
