import { describe, it, expect, vi } from 'vitest';
import { OllamaClient } from '@core/agents/ollama-client';
import { VisionAgent, parseVisionReply, visionVerdict } from '@core/agents/vision-agent';
import { makeClaim } from '../../helpers';

function clientReplying(content: string) {
  const fetchImpl = vi.fn<typeof fetch>(
    async () => new Response(JSON.stringify({ message: { role: 'assistant', content } })),
  );
  return { client: new OllamaClient('http://ollama.test', fetchImpl), fetchImpl };
}

describe('parseVisionReply / visionVerdict', () => {
  it('turns a mismatch into a suspicious verdict', () => {
    const findings = parseVisionReply(
      '{"detected_damage":"dent on rear bumper","mismatch_found":true,"reasoning":"Claim says front impact."}',
    );
    expect(visionVerdict(findings)).toEqual({
      suspicious: true,
      score: 8,
      rationale: 'Claim says front impact. Observed: dent on rear bumper.',
    });
  });

  it('turns a match into a clean verdict', () => {
    const findings = parseVisionReply('{"mismatch_found":false,"reasoning":"Consistent."}');
    expect(visionVerdict(findings)).toEqual({ suspicious: false, score: 1, rationale: 'Consistent.' });
  });

  it('throws on a reply without the mismatch field', () => {
    expect(() => parseVisionReply('I think the photo looks fine')).toThrow('Unreadable vision reply');
  });
});

describe('VisionAgent', () => {
  it('sends the photo with the description to the vision model', async () => {
    const { client, fetchImpl } = clientReplying(
      '{"detected_damage":"scratch","mismatch_found":false,"reasoning":"Matches."}',
    );
    const agent = new VisionAgent(client, 'llama3.2-vision');
    const claim = makeClaim({ evidence: { photoBase64: 'aGVsbG8=' } });

    const verdict = await agent.evaluate(claim, new AbortController().signal);

    expect(verdict.suspicious).toBe(false);
    const body = JSON.parse(String(fetchImpl.mock.calls[0][1]?.body));
    expect(body.model).toBe('llama3.2-vision');
    expect(body.messages[1].images).toEqual(['aGVsbG8=']);
    expect(body.messages[1].content).toContain('Rear bumper dented in a parking lot');
  });

  it('does not call the model when there is no photo', async () => {
    const { client, fetchImpl } = clientReplying('{}');
    const verdict = await new VisionAgent(client, 'llama3.2-vision').evaluate(
      makeClaim(),
      new AbortController().signal,
    );

    expect(verdict).toEqual({
      suspicious: false,
      score: 0,
      rationale: 'No damage photo on file; not assessed',
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
