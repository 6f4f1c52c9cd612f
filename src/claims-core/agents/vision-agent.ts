import { z } from 'zod';
import type { Claim } from '../claim';
import type { AgentVerdict, ClaimAgent } from '../orchestrator';
import { extractJsonObject, type OllamaClient } from './ollama-client';

const ADJUSTER_PROMPT = `You are an insurance adjuster reviewing a vehicle damage photo against the claimant's own description.
Identify the visible damage and where on the vehicle it is, then decide whether it matches what the claimant describes.
Examples of a mismatch: a described front impact with only rear damage visible, a "minor scratch" that is a deep dent, damage on the opposite side.
Reply with a single JSON object and nothing else:
{"detected_damage": "<what you see, with location>", "mismatch_found": <true|false>, "reasoning": "<why>"}`;

export const visionReplySchema = z.object({
  detected_damage: z.string().default(''),
  mismatch_found: z.boolean(),
  reasoning: z.string().default('No reasoning provided'),
});

export type VisionFindings = z.infer<typeof visionReplySchema>;

/** Scores on the 0-10 verdict scale. */
export const VISION_MISMATCH_SCORE = 8;
export const VISION_MATCH_SCORE = 1;

export function parseVisionReply(reply: string): VisionFindings {
  const parsed = visionReplySchema.safeParse(extractJsonObject(reply));
  if (!parsed.success) {
    throw new Error(`Unreadable vision reply: ${reply.slice(0, 120)}`);
  }
  return parsed.data;
}

export function visionVerdict(findings: VisionFindings): AgentVerdict {
  const observed = findings.detected_damage ? ` Observed: ${findings.detected_damage}.` : '';
  return {
    suspicious: findings.mismatch_found,
    score: findings.mismatch_found ? VISION_MISMATCH_SCORE : VISION_MATCH_SCORE,
    rationale: `${findings.reasoning}${observed}`,
  };
}

/**
 * Compares the damage photo on file with the written description using a
 * multimodal model.
 */
export class VisionAgent implements ClaimAgent {
  readonly name = 'vision';

  constructor(
    private readonly client: OllamaClient,
    private readonly model: string,
  ) {}

  async evaluate(claim: Claim, signal: AbortSignal): Promise<AgentVerdict> {
    const photo = claim.evidence.photoBase64;
    if (!photo) {
      return { suspicious: false, score: 0, rationale: 'No damage photo on file; not assessed' };
    }

    const reply = await this.client.chat(
      this.model,
      [
        { role: 'system', content: ADJUSTER_PROMPT },
        {
          role: 'user',
          content: `Claimant's description: "${claim.description}"\nDoes the damage in the photo match it?`,
          images: [photo],
        },
      ],
      signal,
    );
    return visionVerdict(parseVisionReply(reply));
  }
}
