import { z } from 'zod';
import { TEXT_INCONSISTENCY_THRESHOLD, VERDICT_SCORE_RANGE } from '@shared/constants';
import type { Claim } from '../claim';
import type { AgentVerdict, ClaimAgent } from '../orchestrator';
import { extractJsonObject, type OllamaClient } from './ollama-client';

const LINGUIST_PROMPT = `You compare a claimant's phone call transcript with their written claim and look for inconsistencies.
Check facts (weather, time, place, people and vehicles involved), shifts in the story (cause, fault, damage) and pressure or evasive language.
Score 0-2 consistent, 3-4 minor discrepancies, 5-6 notable inconsistencies, 7-8 significant contradictions, 9-10 incompatible accounts.
Reply with a single JSON object and nothing else:
{"inconsistency_score": <0-10>, "contradictions": ["..."], "verdict": "CONSISTENT" | "SUSPICIOUS", "reasoning": "<why>"}`;

export const textReplySchema = z.object({
  inconsistency_score: z.coerce.number().finite(),
  contradictions: z
    .union([z.array(z.string()), z.string()])
    .default([])
    .transform((c) => (typeof c === 'string' ? [c] : c)),
  reasoning: z.string().default('No reasoning provided'),
});

export interface TextFindings {
  score: number;
  contradictions: string[];
  reasoning: string;
}

export function parseTextReply(reply: string): TextFindings {
  const parsed = textReplySchema.safeParse(extractJsonObject(reply));
  if (!parsed.success) {
    throw new Error(`Unreadable text-analysis reply: ${reply.slice(0, 120)}`);
  }

  const { inconsistency_score, contradictions, reasoning } = parsed.data;
  const score = Math.min(
    VERDICT_SCORE_RANGE.max,
    Math.max(VERDICT_SCORE_RANGE.min, Math.round(inconsistency_score)),
  );
  return { score, contradictions, reasoning };
}

export function textVerdict(findings: TextFindings): AgentVerdict {
  const listed = findings.contradictions.slice(0, 3);
  return {
    suspicious: findings.score >= TEXT_INCONSISTENCY_THRESHOLD,
    score: findings.score,
    rationale:
      listed.length > 0
        ? `${findings.reasoning} Contradictions: ${listed.join('; ')}`
        : findings.reasoning,
  };
}

/**
 * Scores how well the call transcript on file agrees with the written claim.
 */
export class TextAgent implements ClaimAgent {
  readonly name = 'text';

  constructor(
    private readonly client: OllamaClient,
    private readonly model: string,
  ) {}

  async evaluate(claim: Claim, signal: AbortSignal): Promise<AgentVerdict> {
    const callLog = claim.evidence.callLog;
    if (!callLog) {
      return { suspicious: false, score: 0, rationale: 'No call transcript on file; not assessed' };
    }

    const reply = await this.client.chat(
      this.model,
      [
        { role: 'system', content: LINGUIST_PROMPT },
        {
          role: 'user',
          content: `=== PHONE CALL TRANSCRIPT ===\n${callLog}\n\n=== WRITTEN CLAIM ===\n${claim.description}`,
        },
      ],
      signal,
    );
    return textVerdict(parseTextReply(reply));
  }
}
