import { describe, it, expect, vi } from 'vitest';
import { OllamaClient } from '@core/agents/ollama-client';
import { TextAgent, parseTextReply, textVerdict } from '@core/agents/text-agent';
import { makeClaim } from '../../helpers';

describe('parseTextReply', () => {
  it('reads score, contradictions and reasoning', () => {
    expect(
      parseTextReply(
        '{"inconsistency_score":7,"contradictions":["weather differs"],"verdict":"SUSPICIOUS","reasoning":"Story shifted."}',
      ),
    ).toEqual({ score: 7, contradictions: ['weather differs'], reasoning: 'Story shifted.' });
  });

  it('clamps and rounds the score and accepts a single contradiction string', () => {
    expect(parseTextReply('{"inconsistency_score":"12.4","contradictions":"time differs"}')).toEqual({
      score: 10,
      contradictions: ['time differs'],
      reasoning: 'No reasoning provided',
    });
    expect(parseTextReply('{"inconsistency_score":-3}').score).toBe(0);
  });

  it('throws when there is no score', () => {
    expect(() => parseTextReply('{"verdict":"CONSISTENT"}')).toThrow('Unreadable text-analysis reply');
  });
});

describe('textVerdict', () => {
  it('is suspicious from a score of 5', () => {
    expect(textVerdict({ score: 5, contradictions: [], reasoning: 'r' }).suspicious).toBe(true);
    expect(textVerdict({ score: 4, contradictions: [], reasoning: 'r' }).suspicious).toBe(false);
  });

  it('lists up to three contradictions in the rationale', () => {
    const verdict = textVerdict({
      score: 9,
      contradictions: ['a', 'b', 'c', 'd'],
      reasoning: 'Accounts differ.',
    });
    expect(verdict.rationale).toBe('Accounts differ. Contradictions: a; b; c');
  });
});

describe('TextAgent', () => {
  it('compares the call log with the written description', async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      async () =>
        new Response(
          JSON.stringify({
            message: { role: 'assistant', content: '{"inconsistency_score":2,"reasoning":"Consistent."}' },
          }),
        ),
    );
    const agent = new TextAgent(new OllamaClient('http://ollama.test', fetchImpl), 'llama3');
    const claim = makeClaim({ evidence: { callLog: 'I backed into a post.' } });

    const verdict = await agent.evaluate(claim, new AbortController().signal);

    expect(verdict).toEqual({ suspicious: false, score: 2, rationale: 'Consistent.' });
    const body = JSON.parse(String(fetchImpl.mock.calls[0][1]?.body));
    expect(body.messages[1].content).toBe(
      '=== PHONE CALL TRANSCRIPT ===\nI backed into a post.\n\n=== WRITTEN CLAIM ===\nRear bumper dented in a parking lot',
    );
  });

  it('does not call the model without a call log', async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const verdict = await new TextAgent(new OllamaClient('http://ollama.test', fetchImpl), 'llama3').evaluate(
      makeClaim(),
      new AbortController().signal,
    );
    expect(verdict.rationale).toBe('No call transcript on file; not assessed');
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
