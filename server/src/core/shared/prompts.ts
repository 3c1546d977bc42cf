import { FINAL_ANSWER_ACTION, type Decision } from '../@types';
import type { ToolDescriptor } from '../tools/toolRegistry';

export const OBSERVATION_PREFIX = 'Observation';
export const CORRECTIVE_PREFIX = 'Your previous reply could not be used';

export const DEFAULT_AGENT_SYSTEM_PROMPT =
  'You are a careful assistant that solves arithmetic questions step by step and always checks numbers with the calculator tool.';

const OBSERVATION_PATTERN = /^Observation(?: \(([^)]+)\))?: ([\s\S]*)$/;

export interface ParsedObservation {
  tool: string | null;
  content: string;
}

export const buildSystemPrompt = (basePrompt: string, tools: ToolDescriptor[]): string => {
  const toolLines = tools.map((tool) => {
    const args = Object.entries(tool.argsHint)
      .map(([name, hint]) => `"${name}": ${hint}`)
      .join(', ');
    return `- ${tool.name}: ${tool.description} Arguments: { ${args} }`;
  });

  return [
    basePrompt.trim(),
    '',
    'Available tools:',
    ...toolLines,
    '',
    'Reply with exactly one JSON object and nothing else:',
    '{"thought": "<your reasoning>", "action": "<tool name or final_answer>", "args": { ... }}',
    `- To call a tool, set "action" to its name and "args" to its arguments.`,
    `- To finish, set "action" to "${FINAL_ANSWER_ACTION}" and "args" to {"answer": "<reply to the user>"}.`,
    '- Call at most one tool per reply and wait for its observation.',
    '- Earlier conversation turns are available; use them to resolve words like "that" or "the previous result".',
  ].join('\n');
};

export const buildObservationMessage = (tool: string, result: string): string => {
  return `${OBSERVATION_PREFIX} (${tool}): ${result}`;
};

export const buildUnknownToolObservation = (tool: string, available: string[]): string => {
  return `${OBSERVATION_PREFIX}: Error: Unknown tool '${tool}'. Available tools: ${available.join(', ')}. Call one of them or use "${FINAL_ANSWER_ACTION}".`;
};

export const buildCorrectiveInstruction = (problem: string): string => {
  return `${CORRECTIVE_PREFIX}: ${problem}. Reply again with a single JSON object {"thought": string, "action": string, "args": object}.`;
};

export const parseObservation = (content: string): ParsedObservation | null => {
  const match = OBSERVATION_PATTERN.exec(content);

  if (!match) {
    return null;
  }

  return {
    tool: match[1] ?? null,
    content: match[2] ?? '',
  };
};

export const serializeDecision = (decision: Decision): string => {
  if (decision.kind === 'final_answer') {
    return JSON.stringify({
      thought: decision.thought,
      action: FINAL_ANSWER_ACTION,
      args: { answer: decision.answer },
    });
  }

  return JSON.stringify({
    thought: decision.thought,
    action: decision.tool,
    args: decision.args,
  });
};
