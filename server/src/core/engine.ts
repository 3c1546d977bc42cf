import { AgentLoop, type AgentLoopSettings } from './agents/agentLoop';
import { AgentRunner } from './agents/agentRunner';
import { ReasoningClient } from './agents/reasoningClient';
import { ReplayCoordinator } from './agents/replayCoordinator';
import { RunRegistry } from './agents/runRegistry';
import { TraceRecorder } from './memory/traceRecorder';
import type { SessionStore, TraceStore } from './memory/traceStore';
import { StreamPublisher } from './realtime/streamPublisher';
import { TraceEventBus } from './realtime/traceEventBus';
import { calculatorTool } from './tools/calculator';
import type { LlmTool } from './tools/llm';
import { ToolRegistry } from './tools/toolRegistry';

export interface AgentEngineOptions {
  traceStore: TraceStore;
  sessionStore: SessionStore;
  llm: LlmTool;
  settings: AgentLoopSettings;
  reasoningMaxRetries: number;
  clock?: () => Date;
}

export interface AgentEngine {
  settings: AgentLoopSettings;
  traceStore: TraceStore;
  sessionStore: SessionStore;
  bus: TraceEventBus;
  tools: ToolRegistry;
  recorder: TraceRecorder;
  reasoning: ReasoningClient;
  loop: AgentLoop;
  runs: RunRegistry;
  runner: AgentRunner;
  replay: ReplayCoordinator;
  publisher: StreamPublisher;
}

export const createToolRegistry = (): ToolRegistry => {
  const tools = new ToolRegistry();
  tools.register(calculatorTool);
  return tools;
};

export const createAgentEngine = (options: AgentEngineOptions): AgentEngine => {
  const bus = new TraceEventBus();
  const tools = createToolRegistry();
  const recorder = new TraceRecorder(options.traceStore, bus, options.clock);
  const reasoning = new ReasoningClient(options.llm, { maxRetries: options.reasoningMaxRetries });
  const loop = new AgentLoop(reasoning, tools, recorder, options.settings);
  const runs = new RunRegistry();
  const runner = new AgentRunner(loop, options.sessionStore, runs);

  return {
    settings: options.settings,
    traceStore: options.traceStore,
    sessionStore: options.sessionStore,
    bus,
    tools,
    recorder,
    reasoning,
    loop,
    runs,
    runner,
    replay: new ReplayCoordinator(options.traceStore, runner),
    publisher: new StreamPublisher(bus),
  };
};
