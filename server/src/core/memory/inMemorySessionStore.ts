import { randomUUID } from 'node:crypto';

import type {
  AgentProfileRecord,
  ChatSessionRecord,
  NewAgentProfile,
  NewChatSession,
} from '../@types';
import { NotFoundError } from '../shared/errors/app-error';
import type { SessionStore } from './traceStore';

export class InMemorySessionStore implements SessionStore {
  private readonly agents = new Map<string, AgentProfileRecord>();
  private readonly sessions = new Map<string, ChatSessionRecord>();

  public async createAgent(profile: NewAgentProfile): Promise<AgentProfileRecord> {
    if ([...this.agents.values()].some((agent) => agent.slug === profile.slug)) {
      throw new Error(`Agent slug ${profile.slug} is already taken.`);
    }

    const now = new Date();
    const agent: AgentProfileRecord = {
      ...profile,
      id: randomUUID(),
      isActive: true,
      createdAt: now,
      updatedAt: now,
    };

    this.agents.set(agent.id, agent);
    return { ...agent };
  }

  public async getAgent(agentId: string): Promise<AgentProfileRecord | null> {
    const agent = this.agents.get(agentId);
    return agent ? { ...agent } : null;
  }

  public async findAgentBySlug(slug: string): Promise<AgentProfileRecord | null> {
    const agent = [...this.agents.values()].find((item) => item.slug === slug);
    return agent ? { ...agent } : null;
  }

  public async createSession(input: NewChatSession): Promise<ChatSessionRecord> {
    if (!this.agents.has(input.agentId)) {
      throw new NotFoundError('Agent', input.agentId);
    }

    const now = new Date();
    const session: ChatSessionRecord = {
      ...input,
      id: randomUUID(),
      isActive: true,
      lastActiveAt: now,
      createdAt: now,
    };

    this.sessions.set(session.id, session);
    return { ...session };
  }

  public async getSession(sessionId: string): Promise<ChatSessionRecord | null> {
    const session = this.sessions.get(sessionId);
    return session ? { ...session } : null;
  }

  public async touchSession(sessionId: string, at: Date): Promise<void> {
    const session = this.sessions.get(sessionId);

    if (!session) {
      throw new NotFoundError('Session', sessionId);
    }

    session.lastActiveAt = at;
  }
}
