import type {
  AgentProfileRecord,
  ChatSessionRecord,
  SessionResponse,
  SessionTracesResponse,
} from '../../core/@types';
import type { AgentEngine } from '../../core/engine';
import { NotFoundError } from '../../core/shared/errors/app-error';
import { logger } from '../../core/shared/logger';
import { DEFAULT_AGENT_SYSTEM_PROMPT } from '../../core/shared/prompts';
import { toSessionResponse, toTraceResponse } from '../../core/shared/serializers';
import type { CreateSessionBody } from './sessions.schema';

export const DEFAULT_AGENT_SLUG = 'calculator';

export class SessionsService {
  public constructor(private readonly engine: AgentEngine) {}

  public async createSession(payload: CreateSessionBody): Promise<SessionResponse> {
    const session = await this.openSession(payload.user_id, payload.agent_slug, payload.context_data);
    return toSessionResponse(session);
  }

  public async getSession(sessionId: string): Promise<SessionResponse> {
    return toSessionResponse(await this.mustGetSession(sessionId));
  }

  public async getSessionTraces(sessionId: string): Promise<SessionTracesResponse> {
    await this.mustGetSession(sessionId);
    const traces = await this.engine.traceStore.listSessionTraces(sessionId);

    return {
      session_id: sessionId,
      traces: traces.map(toTraceResponse),
    };
  }

  public async openSession(
    userId: string,
    agentSlug?: string,
    contextData: Record<string, unknown> = {},
  ): Promise<ChatSessionRecord> {
    const agent = agentSlug
      ? await this.mustGetAgentBySlug(agentSlug)
      : await this.ensureDefaultAgent();

    const session = await this.engine.sessionStore.createSession({
      userId,
      agentId: agent.id,
      contextData,
    });

    logger.info('session_created', { sessionId: session.id, agentId: agent.id, userId });
    return session;
  }

  public async mustGetSession(sessionId: string): Promise<ChatSessionRecord> {
    const session = await this.engine.sessionStore.getSession(sessionId);

    if (!session) {
      throw new NotFoundError('Session', sessionId);
    }

    return session;
  }

  public async ensureDefaultAgent(): Promise<AgentProfileRecord> {
    const existing = await this.engine.sessionStore.findAgentBySlug(DEFAULT_AGENT_SLUG);

    if (existing) {
      return existing;
    }

    try {
      const agent = await this.engine.sessionStore.createAgent({
        name: 'Calculator Agent',
        slug: DEFAULT_AGENT_SLUG,
        description: 'Answers arithmetic questions and checks every number with the calculator tool.',
        systemPrompt: DEFAULT_AGENT_SYSTEM_PROMPT,
        modelConfig: {
          model: this.engine.settings.model,
          temperature: this.engine.settings.temperature,
        },
      });

      logger.info('default_agent_created', { slug: DEFAULT_AGENT_SLUG, agentId: agent.id });
      return agent;
    } catch (error: unknown) {
      // A concurrent request may have inserted the same slug first.
      const created = await this.engine.sessionStore.findAgentBySlug(DEFAULT_AGENT_SLUG);

      if (!created) {
        throw error;
      }

      return created;
    }
  }

  private async mustGetAgentBySlug(slug: string): Promise<AgentProfileRecord> {
    const agent = await this.engine.sessionStore.findAgentBySlug(slug);

    if (!agent) {
      throw new NotFoundError('Agent', slug);
    }

    return agent;
  }
}
