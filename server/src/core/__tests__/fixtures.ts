import type { AgentProfileRecord, ChatSessionRecord } from '../@types';
import type { AgentLoopSettings } from '../agents/agentLoop';
import { createAgentEngine, type AgentEngine } from '../engine';
import { InMemorySessionStore } from '../memory/inMemorySessionStore';
import { InMemoryTraceStore } from '../memory/inMemoryTraceStore';
import type { TraceStore } from '../memory/traceStore';
import { setLogLevel } from '../shared/logger';
import type {
  GenerateChatCompletionInput,
  GenerateChatCompletionOutput,
  LlmTool,
} from '../tools/llm';

setLogLevel('error');

export type ScriptedReply =
  | string
  | Error
  | ((input: GenerateChatCompletionInput) => string | Promise<string>);

/** Language-model stand-in that plays back a fixed list of replies. */
export class ScriptedLlmTool implements LlmTool {
  public readonly provider = 'mock' as const;
  public readonly calls: GenerateChatCompletionInput[] = [];

  public constructor(
    private readonly replies: ScriptedReply[],
    private readonly usage = { promptTokens: 10, completionTokens: 5 },
    private readonly model = 'gpt-4o-mini',
  ) {}

  public async generateChatCompletion(
    input: GenerateChatCompletionInput,
  ): Promise<GenerateChatCompletionOutput> {
    this.calls.push({ ...input, messages: [...input.messages] });
    const reply = this.replies.shift();

    if (reply === undefined) {
      throw new Error('No scripted reply left.');
    }

    if (reply instanceof Error) {
      throw reply;
    }

    const text = typeof reply === 'function' ? await reply(input) : reply;

    return {
      text,
      model: this.model,
      provider: 'mock',
      promptTokens: this.usage.promptTokens,
      completionTokens: this.usage.completionTokens,
      finishReason: 'stop',
    };
  }
}

export const toolCall = (tool: string, args: Record<string, unknown>, thought = 'I will use a tool.') =>
  JSON.stringify({ thought, action: tool, args });

export const finalAnswer = (answer: string, thought = 'I have the answer.') =>
  JSON.stringify({ thought, action: 'final_answer', args: { answer } });

export const TEST_SETTINGS: AgentLoopSettings = {
  model: 'gpt-4o-mini',
  provider: 'mock',
  temperature: 0,
  maxIterations: 10,
  historyWindow: 5,
  timeoutMs: 300_000,
};

export interface TestEngineOptions {
  settings?: Partial<AgentLoopSettings>;
  traceStore?: TraceStore;
}

export const createTestEngine = (llm: LlmTool, options: TestEngineOptions = {}): AgentEngine => {
  return createAgentEngine({
    traceStore: options.traceStore ?? new InMemoryTraceStore(),
    sessionStore: new InMemorySessionStore(),
    llm,
    reasoningMaxRetries: 2,
    settings: { ...TEST_SETTINGS, ...options.settings },
  });
};

export interface TestSession {
  agent: AgentProfileRecord;
  session: ChatSessionRecord;
}

export const openTestSession = async (engine: AgentEngine): Promise<TestSession> => {
  const agent = await engine.sessionStore.createAgent({
    name: 'Test Agent',
    slug: `test-agent-${Math.random().toString(36).slice(2, 9)}`,
    description: null,
    systemPrompt: 'You are a test agent.',
    modelConfig: {},
  });
  const session = await engine.sessionStore.createSession({
    userId: 'test-user',
    agentId: agent.id,
    contextData: {},
  });

  return { agent, session };
};
