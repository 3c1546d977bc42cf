import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryColumn,
} from 'typeorm';

import type { AgentErrorKind, JsonObject, TraceStatus } from '../../core/@types';
import { Agent } from './Agent';
import { ChatSession } from './ChatSession';
import { numericTransformer } from './numericTransformer';
import { TraceStep } from './TraceStep';

export const TRACE_STATUSES: TraceStatus[] = ['running', 'completed', 'failed', 'cancelled'];

@Entity({ name: 'traces' })
@Index(['sessionId', 'createdAt'])
export class Trace {
  @PrimaryColumn({ type: 'uuid' })
  id!: string;

  @Column({ name: 'session_id', type: 'uuid' })
  sessionId!: string;

  @ManyToOne(() => ChatSession, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'session_id' })
  session!: ChatSession;

  @Column({ name: 'agent_id', type: 'uuid' })
  agentId!: string;

  @ManyToOne(() => Agent, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'agent_id' })
  agent!: Agent;

  @Column({ name: 'user_input', type: 'text' })
  userInput!: string;

  @Column({ name: 'final_output', type: 'text', nullable: true })
  finalOutput!: string | null;

  @Column({ name: 'run_name', type: 'varchar', length: 200, nullable: true })
  runName!: string | null;

  @Column({ name: 'total_tokens', type: 'integer', default: 0 })
  totalTokens!: number;

  @Column({
    name: 'total_cost',
    type: 'numeric',
    precision: 12,
    scale: 6,
    default: 0,
    transformer: numericTransformer,
  })
  totalCost!: number;

  @Column({ name: 'latency_ms', type: 'integer', default: 0 })
  latencyMs!: number;

  @Index()
  @Column({ type: 'enum', enum: TRACE_STATUSES, enumName: 'trace_status_enum', default: 'running' })
  status!: TraceStatus;

  @Column({ name: 'is_successful', type: 'boolean', default: false })
  isSuccessful!: boolean;

  @Column({ name: 'error_kind', type: 'varchar', length: 40, nullable: true })
  errorKind!: AgentErrorKind | null;

  @Column({ name: 'error_message', type: 'text', nullable: true })
  errorMessage!: string | null;

  @Column({ name: 'system_prompt_snapshot', type: 'text', nullable: true })
  systemPromptSnapshot!: string | null;

  @Column({ name: 'model_config_snapshot', type: 'jsonb', nullable: true })
  modelConfigSnapshot!: JsonObject | null;

  @Column({ name: 'replayed_from_trace_id', type: 'uuid', nullable: true })
  replayedFromTraceId!: string | null;

  @Column({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @Column({ name: 'completed_at', type: 'timestamptz', nullable: true })
  completedAt!: Date | null;

  @OneToMany(() => TraceStep, (step) => step.trace)
  steps!: TraceStep[];
}
