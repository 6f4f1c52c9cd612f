import type { ClaimAgent } from '../orchestrator';
import { OllamaClient } from './ollama-client';
import { TextAgent } from './text-agent';
import { VisionAgent } from './vision-agent';

export { OllamaClient } from './ollama-client';
export { TextAgent } from './text-agent';
export { VisionAgent } from './vision-agent';

export interface OllamaAgentsConfig {
  url: string;
  visionModel: string;
  textModel: string;
}

/**
 * The default agent line-up, vision first then text. The orchestrator
 * reports verdicts in this order.
 */
export function createOllamaAgents(config: OllamaAgentsConfig, fetchImpl?: typeof fetch): ClaimAgent[] {
  const client = new OllamaClient(config.url, fetchImpl);
  return [new VisionAgent(client, config.visionModel), new TextAgent(client, config.textModel)];
}
