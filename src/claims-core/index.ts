// claims-core: states, transitions, insertion, agent orchestration and the
// state-entry monitor. No HTTP here.

import { ClaimEngine } from './engine';
import type { Logger } from './logger';
import { ClaimOrchestrator, type ClaimAgent } from './orchestrator';
import { ProcessMonitor } from './process-monitor';
import type { ClaimRepository } from './repository';
import { ClaimStateMachine } from './state-machine';

export interface ClaimWorkflowOptions {
  agents: readonly ClaimAgent[];
  repository: ClaimRepository;
  agentTimeoutMs?: number;
  /** Builds the logger for each component from its tag. */
  logger?: (tag: string) => Logger;
}

export interface ClaimWorkflow {
  engine: ClaimEngine;
  stateMachine: ClaimStateMachine;
  orchestrator: ClaimOrchestrator;
  monitor: ProcessMonitor;
}

/**
 * Wire the state machine, orchestrator, monitor and engine together.
 */
export function createClaimWorkflow(options: ClaimWorkflowOptions): ClaimWorkflow {
  const stateMachine = new ClaimStateMachine();
  const orchestrator = new ClaimOrchestrator(options.agents, {
    agentTimeoutMs: options.agentTimeoutMs,
    logger: options.logger?.('ORCHESTRATOR'),
  });
  const monitor = new ProcessMonitor(stateMachine, orchestrator, options.logger?.('MONITOR'));
  const engine = new ClaimEngine({
    repository: options.repository,
    stateMachine,
    monitor,
    logger: options.logger?.('ENGINE'),
  });
  return { engine, stateMachine, orchestrator, monitor };
}
