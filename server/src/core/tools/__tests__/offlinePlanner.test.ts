import { describe, expect, it } from 'vitest';

import type { ChatMessage } from '../../@types';
import { buildObservationMessage } from '../../shared/prompts';
import { extractExpression, planOfflineReply } from '../offlinePlanner';

describe('extractExpression', () => {
  it('pulls an inline expression out of a question', () => {
    expect(extractExpression('What is 12 * 4?')).toBe('12 * 4');
  });

  it('translates word operators', () => {
    expect(extractExpression('what is 7 plus 8')).toBe('7 + 8');
  });

  it('understands verbal operations', () => {
    expect(extractExpression('add 5 to 10')).toBe('10 + 5');
    expect(extractExpression('subtract 3 from 10')).toBe('10 - 3');
  });

  it('resolves references from the previous answer', () => {
    expect(extractExpression('Multiply that by 3', '2')).toBe('2 * 3');
    expect(extractExpression('divide it by 4', 'The answer is 20')).toBe('20 / 4');
  });

  it('returns null without arithmetic', () => {
    expect(extractExpression('hello there')).toBeNull();
  });
});

describe('planOfflineReply', () => {
  const system: ChatMessage = { role: 'system', content: 'You are a test agent.' };

  it('calls the calculator for a fresh question', () => {
    expect(planOfflineReply([system, { role: 'user', content: '1 + 1' }])).toEqual({
      thought: 'The user asks for 1 + 1; I will evaluate it with the calculator.',
      action: 'calculator',
      args: { expression: '1 + 1' },
    });
  });

  it('answers with the observation once the tool has run', () => {
    const reply = planOfflineReply([
      system,
      { role: 'user', content: '1 + 1' },
      { role: 'assistant', content: '{"thought":"","action":"calculator","args":{}}' },
      { role: 'user', content: buildObservationMessage('calculator', '2') },
    ]);

    expect(reply.action).toBe('final_answer');
    expect(reply.args).toEqual({ answer: '2' });
  });

  it('explains tool errors in the answer', () => {
    const reply = planOfflineReply([
      system,
      { role: 'user', content: '1 / 0' },
      { role: 'user', content: buildObservationMessage('calculator', 'Error: Cannot divide by zero') },
    ]);

    expect(reply.args).toEqual({ answer: 'I could not compute that. Error: Cannot divide by zero' });
  });

  it('uses the previous turn of the conversation', () => {
    const reply = planOfflineReply([
      system,
      { role: 'user', content: '1 + 1' },
      { role: 'assistant', content: '2' },
      { role: 'user', content: 'Multiply that by 3' },
    ]);

    expect(reply.args).toEqual({ expression: '2 * 3' });
  });

  it('gives a final answer when there is nothing to compute', () => {
    expect(planOfflineReply([system, { role: 'user', content: 'hello' }])).toEqual({
      thought: 'The request does not contain an arithmetic expression.',
      action: 'final_answer',
      args: { answer: 'I can help with arithmetic questions such as "12 * (3 + 4)".' },
    });
  });
});
