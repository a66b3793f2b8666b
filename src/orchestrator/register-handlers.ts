import type { Config } from '../config/validator';
import type { Collaborators } from '../collaborators/types';
import { NODE_PROFILES } from '../agents';
import { runNode } from '../agents/node-template';
import type { NodeRuntime } from '../agents/types';
import { AgentCoordinator } from './agent-coordinator';
import type { WorkflowLogger } from './logger';
import type { NodeName } from './states';

const NODES: readonly NodeName[] = ['planner', 'coder', 'tester', 'reviewer'];

export function createNodeRuntime(config: Config, collaborators: Collaborators, logger?: WorkflowLogger): NodeRuntime {
  return {
    collaborators,
    agents: config.agents,
    maxErrorContext: config.workflow.max_error_context,
    testPassThreshold: config.workflow.test_pass_threshold,
    defaultLanguage: config.workflow.default_language,
    logger,
  };
}

/** Coordinator with every role bound to the shared node template */
export function createAgentCoordinator(runtime: NodeRuntime): AgentCoordinator {
  const coordinator = new AgentCoordinator();

  for (const node of NODES) {
    const profile = NODE_PROFILES[node];
    coordinator.registerHandler(node, (state) => runNode(profile, state, runtime));
  }

  return coordinator;
}
