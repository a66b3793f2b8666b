import type { Collaborators } from '../collaborators/types';
import type { AgentSettings } from '../config/validator';
import type { WorkflowLogger } from '../orchestrator/logger';
import type { NodeName, Phase, WorkflowState } from '../orchestrator/states';

/** What a prompt builder may see of the state */
export interface PromptContext {
  requirements: string;
  plan?: string;
  code?: string;
  tests?: string;
  filesCreated: readonly string[];
  testCoverage?: number;
  iteration: number;
  /** Most recent errors, each cut to a bounded length */
  recentErrors: string[];
  recentWarnings: string[];
}

export interface NodeRuntime {
  collaborators: Collaborators;
  agents: Record<NodeName, AgentSettings>;
  /** How many recent errors and warnings go into a prompt */
  maxErrorContext: number;
  testPassThreshold: number;
  /** Language assumed for untagged code blocks */
  defaultLanguage?: string;
  logger?: WorkflowLogger;
}

export type ArtifactField = 'plan' | 'code' | 'tests' | 'review';

export interface HookResult {
  state: WorkflowState;
  /** Stop the node here, without generating */
  halt?: boolean;
}

/**
 * Everything that distinguishes one role from another. The shared
 * template in node-template.ts does the rest.
 */
export interface NodeProfile {
  name: NodeName;
  phase: Phase;
  artifact: ArtifactField;
  messages: {
    start: string;
    generated: string;
    fallback: string;
    done: string;
  };
  buildPrompt(ctx: PromptContext): string;
  /** Deterministic, never-empty artifact used when generation fails */
  fallback(state: Readonly<WorkflowState>, runtime: NodeRuntime): string;
  before?(state: WorkflowState, runtime: NodeRuntime): Promise<HookResult>;
  after?(state: WorkflowState, artifact: string, runtime: NodeRuntime): Promise<WorkflowState>;
}
