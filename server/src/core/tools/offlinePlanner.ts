import { FINAL_ANSWER_ACTION, type ChatMessage, type JsonObject } from '../@types';
import { CORRECTIVE_PREFIX, parseObservation, type ParsedObservation } from '../shared/prompts';

export interface PlannedReply {
  thought: string;
  action: string;
  args: JsonObject;
}

const NUMBER = '-?\\d+(?:\\.\\d+)?';
const NUMBER_PATTERN = new RegExp(NUMBER, 'g');
const REFERENCE_PATTERN =
  /\b(?:the\s+(?:previous|last)\s+(?:result|answer)|the\s+result|that|it|this)\b/g;

const VERBAL_PATTERNS: ReadonlyArray<{
  pattern: RegExp;
  build: (left: string, right: string) => string;
}> = [
  {
    pattern: new RegExp(`\\bmultiply\\s+(${NUMBER})\\s+(?:by|with)\\s+(${NUMBER})`),
    build: (left, right) => `${left} * ${right}`,
  },
  {
    pattern: new RegExp(`\\bdivide\\s+(${NUMBER})\\s+by\\s+(${NUMBER})`),
    build: (left, right) => `${left} / ${right}`,
  },
  {
    pattern: new RegExp(`\\badd\\s+(${NUMBER})\\s+(?:to|and)\\s+(${NUMBER})`),
    build: (left, right) => `${right} + ${left}`,
  },
  {
    pattern: new RegExp(`\\bsubtract\\s+(${NUMBER})\\s+from\\s+(${NUMBER})`),
    build: (left, right) => `${right} - ${left}`,
  },
];

const WORD_OPERATORS: ReadonlyArray<[RegExp, string]> = [
  [/\bmultiplied\s+by\b/g, '*'],
  [/\bdivided\s+by\b/g, '/'],
  [/\btimes\b/g, '*'],
  [/\bplus\b/g, '+'],
  [/\bminus\b/g, '-'],
  [/\bover\b/g, '/'],
  [/(\d)\s*x\s*(?=[\d(])/g, '$1 * '],
];

const lastNumberIn = (text: string): string | undefined => {
  const matches = text.match(NUMBER_PATTERN);
  return matches?.[matches.length - 1];
};

const isConversationInput = (message: ChatMessage): boolean => {
  return (
    message.role === 'user' &&
    parseObservation(message.content) === null &&
    !message.content.startsWith(CORRECTIVE_PREFIX)
  );
};

/**
 * Turns a natural-language arithmetic request into a calculator expression. References
 * such as "that" are replaced by the last number of the previous answer.
 */
export const extractExpression = (input: string, previousAnswer?: string): string | null => {
  let text = input.toLowerCase();
  const previousNumber = previousAnswer ? lastNumberIn(previousAnswer) : undefined;

  if (previousNumber !== undefined) {
    text = text.replace(REFERENCE_PATTERN, previousNumber);
  }

  for (const { pattern, build } of VERBAL_PATTERNS) {
    const match = pattern.exec(text);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      return build(match[1], match[2]);
    }
  }

  for (const [pattern, replacement] of WORD_OPERATORS) {
    text = text.replace(pattern, replacement);
  }

  const candidates = text.match(/[\d.()+\-*/\s]+/g) ?? [];
  const expression = candidates
    .map((candidate) => candidate.trim())
    .filter((candidate) => /\d/.test(candidate) && /\d\s*[+\-*/]\s*[\d(.-]/.test(candidate))
    .sort((left, right) => right.length - left.length)[0];

  return expression ?? null;
};

export const planOfflineReply = (messages: ChatMessage[]): PlannedReply => {
  let inputIndex = -1;
  messages.forEach((message, index) => {
    if (isConversationInput(message)) {
      inputIndex = index;
    }
  });

  const input = messages[inputIndex];

  if (!input) {
    return {
      thought: 'There is no user request to work on.',
      action: FINAL_ANSWER_ACTION,
      args: { answer: 'Please send a question.' },
    };
  }

  const observation = messages
    .slice(inputIndex + 1)
    .map((message) => (message.role === 'user' ? parseObservation(message.content) : null))
    .filter((parsed): parsed is ParsedObservation => parsed !== null)
    .pop();

  if (observation) {
    const failed = observation.content.startsWith('Error');
    return {
      thought: failed
        ? `The tool reported a problem: ${observation.content}`
        : `The ${observation.tool ?? 'tool'} returned ${observation.content}.`,
      action: FINAL_ANSWER_ACTION,
      args: {
        answer: failed ? `I could not compute that. ${observation.content}` : observation.content,
      },
    };
  }

  const previousAnswer = messages
    .slice(0, inputIndex)
    .filter((message) => message.role === 'assistant')
    .pop()?.content;
  const expression = extractExpression(input.content, previousAnswer);

  if (!expression) {
    return {
      thought: 'The request does not contain an arithmetic expression.',
      action: FINAL_ANSWER_ACTION,
      args: { answer: 'I can help with arithmetic questions such as "12 * (3 + 4)".' },
    };
  }

  return {
    thought: `The user asks for ${expression}; I will evaluate it with the calculator.`,
    action: 'calculator',
    args: { expression },
  };
};
