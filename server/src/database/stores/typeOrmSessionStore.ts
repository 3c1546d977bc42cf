import type { DataSource, Repository } from 'typeorm';

import type {
  AgentProfileRecord,
  ChatSessionRecord,
  NewAgentProfile,
  NewChatSession,
} from '../../core/@types';
import type { SessionStore } from '../../core/memory/traceStore';
import { NotFoundError } from '../../core/shared/errors/app-error';
import { Agent } from '../entities/Agent';
import { ChatSession } from '../entities/ChatSession';

const toAgentRecord = (agent: Agent): AgentProfileRecord => ({
  id: agent.id,
  name: agent.name,
  slug: agent.slug,
  description: agent.description,
  systemPrompt: agent.systemPrompt,
  modelConfig: agent.modelConfig,
  isActive: agent.isActive,
  createdAt: agent.createdAt,
  updatedAt: agent.updatedAt,
});

const toSessionRecord = (session: ChatSession): ChatSessionRecord => ({
  id: session.id,
  userId: session.userId,
  agentId: session.agentId,
  contextData: session.contextData,
  isActive: session.isActive,
  lastActiveAt: session.lastActiveAt,
  createdAt: session.createdAt,
});

export class TypeOrmSessionStore implements SessionStore {
  private readonly agents: Repository<Agent>;
  private readonly sessions: Repository<ChatSession>;

  public constructor(dataSource: DataSource) {
    this.agents = dataSource.getRepository(Agent);
    this.sessions = dataSource.getRepository(ChatSession);
  }

  public async createAgent(profile: NewAgentProfile): Promise<AgentProfileRecord> {
    const agent = this.agents.create({ ...profile, isActive: true });
    return toAgentRecord(await this.agents.save(agent));
  }

  public async getAgent(agentId: string): Promise<AgentProfileRecord | null> {
    const agent = await this.agents.findOneBy({ id: agentId });
    return agent ? toAgentRecord(agent) : null;
  }

  public async findAgentBySlug(slug: string): Promise<AgentProfileRecord | null> {
    const agent = await this.agents.findOneBy({ slug });
    return agent ? toAgentRecord(agent) : null;
  }

  public async createSession(input: NewChatSession): Promise<ChatSessionRecord> {
    const agent = await this.agents.findOneBy({ id: input.agentId });

    if (!agent) {
      throw new NotFoundError('Agent', input.agentId);
    }

    const session = this.sessions.create({
      ...input,
      isActive: true,
      lastActiveAt: new Date(),
    });

    return toSessionRecord(await this.sessions.save(session));
  }

  public async getSession(sessionId: string): Promise<ChatSessionRecord | null> {
    const session = await this.sessions.findOneBy({ id: sessionId });
    return session ? toSessionRecord(session) : null;
  }

  public async touchSession(sessionId: string, at: Date): Promise<void> {
    await this.sessions.update({ id: sessionId }, { lastActiveAt: at });
  }
}
