import { Column, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn, Unique } from 'typeorm';

import type { JsonObject, StepKind } from '../../core/@types';
import { numericTransformer } from './numericTransformer';
import { Trace } from './Trace';

export const STEP_KINDS: StepKind[] = ['thought', 'tool_call', 'tool_result', 'response'];

@Entity({ name: 'trace_steps' })
@Unique('UQ_trace_steps_trace_sequence', ['traceId', 'sequenceOrder'])
export class TraceStep {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'trace_id', type: 'uuid' })
  traceId!: string;

  @ManyToOne(() => Trace, (trace) => trace.steps, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'trace_id' })
  trace!: Trace;

  @Column({ name: 'sequence_order', type: 'integer' })
  sequenceOrder!: number;

  @Column({ name: 'step_type', type: 'enum', enum: STEP_KINDS, enumName: 'step_type_enum' })
  stepType!: StepKind;

  @Column({ name: 'step_name', type: 'varchar', length: 120, nullable: true })
  stepName!: string | null;

  @Column({ name: 'input_payload', type: 'jsonb', nullable: true })
  inputPayload!: JsonObject | null;

  @Column({ name: 'output_payload', type: 'jsonb', nullable: true })
  outputPayload!: JsonObject | null;

  @Column({ name: 'latency_ms', type: 'integer', default: 0 })
  latencyMs!: number;

  @Column({ type: 'integer', default: 0 })
  tokens!: number;

  @Column({
    name: 'cost_usd',
    type: 'numeric',
    precision: 12,
    scale: 6,
    default: 0,
    transformer: numericTransformer,
  })
  costUsd!: number;

  @Column({ name: 'is_error', type: 'boolean', default: false })
  isError!: boolean;

  @Column({ name: 'error_message', type: 'text', nullable: true })
  errorMessage!: string | null;

  @Column({ name: 'started_at', type: 'timestamptz' })
  startedAt!: Date;

  @Column({ name: 'completed_at', type: 'timestamptz', nullable: true })
  completedAt!: Date | null;
}
