import { describe, it, expect } from 'vitest';
import { renderEvent } from '../src/api/query';
import { QueryBodySchema } from '../src/schemas';

describe('renderEvent', () => {
  it('writes answer and citation text as is', () => {
    expect(renderEvent({ type: 'answer', text: 'The RBI held rates.' })).toBe('The RBI held rates.');
    expect(
      renderEvent({
        type: 'citations',
        citations: [{ number: 1, title: 'A', url: 'https://a.example.com/1' }],
        text: '\n\n---\n**Sources:**\n1. [A](https://a.example.com/1)\n',
      })
    ).toBe('\n\n---\n**Sources:**\n1. [A](https://a.example.com/1)\n');
  });

  it('writes errors as a visible line', () => {
    expect(renderEvent({ type: 'error', message: 'Vector index unavailable: down', partialAnswer: 'The' })).toBe(
      '\n\n**Error:** Vector index unavailable: down'
    );
  });
});

describe('QueryBodySchema', () => {
  it('accepts a query with a session and optional sources', () => {
    const parsed = QueryBodySchema.parse({ query: '  How did the Nifty close?  ', session_id: 'abc', sources: ['Moneycontrol'] });

    expect(parsed).toEqual({ query: 'How did the Nifty close?', session_id: 'abc', sources: ['Moneycontrol'] });
  });

  it('rejects a blank query', () => {
    const result = QueryBodySchema.safeParse({ query: '   ', session_id: 'abc' });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0].message).toBe('Query cannot be empty');
  });

  it('requires a session id', () => {
    const result = QueryBodySchema.safeParse({ query: 'Nifty' });

    expect(result.success).toBe(false);
    expect(result.error?.issues.map(issue => issue.path.join('.'))).toEqual(['session_id']);
  });

  it('rejects an overlong query', () => {
    expect(QueryBodySchema.safeParse({ query: 'a'.repeat(1001), session_id: 'abc' }).success).toBe(false);
  });
});
