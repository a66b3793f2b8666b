import type { NodeName, Phase } from './states';

/** Forward order a successful session walks through */
export const PHASE_ORDER: readonly Phase[] = ['planning', 'coding', 'testing', 'reviewing', 'complete'];

/**
 * Legal phase changes. Besides the forward order this holds the two retry
 * edges (testing → coding, reviewing → coding), the cap escape from coding
 * straight to reviewing, and the terminal exits.
 */
export const transitions: Record<Phase, readonly Phase[]> = {
  planning: ['coding', 'failed', 'complete'],
  coding: ['testing', 'reviewing', 'failed', 'complete'],
  testing: ['reviewing', 'coding', 'failed', 'complete'],
  reviewing: ['complete', 'coding', 'failed'],
  complete: [],
  failed: [],
};

/** Phase each node puts the session in when it starts */
export const NODE_PHASES: Record<NodeName, Phase> = {
  planner: 'planning',
  coder: 'coding',
  tester: 'testing',
  reviewer: 'reviewing',
};

export function isTerminalPhase(phase: Phase): boolean {
  return phase === 'complete' || phase === 'failed';
}
