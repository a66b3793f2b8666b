export type Phase = 'planning' | 'coding' | 'testing' | 'reviewing' | 'complete' | 'failed';

export type TerminalPhase = Extract<Phase, 'complete' | 'failed'>;

export type WorkflowStatus = 'in_progress' | 'completed' | 'failed' | 'needs_revision';

export type NodeName = 'planner' | 'coder' | 'tester' | 'reviewer';

/** Routing target that ends the session */
export const END = '__end__';

export type RouteTarget = NodeName | typeof END;

export type MessageKind = 'info' | 'thinking' | 'success' | 'warning' | 'error';

export interface Message {
  agent: string;
  text: string;
  kind: MessageKind;
  timestamp: string;
}

export interface WorkflowMetrics {
  testCoverage?: number;
  codeQualityScore?: number;
  reviewScore?: number;
}

export interface RetryCounters {
  /** Failed test runs since the last passing one */
  coderTester: number;
  /** Rejected reviews in this session */
  reviewerCoder: number;
}

/**
 * The single record threaded through every node. Treat as immutable:
 * every mutator in workflow-state.ts returns a fresh value.
 */
export interface WorkflowState {
  readonly requirements: string;
  readonly plan?: string;
  readonly code?: string;
  readonly tests?: string;
  readonly review?: string;
  readonly messages: readonly Message[];
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  readonly filesCreated: readonly string[];
  readonly filesModified: readonly string[];
  readonly metrics: Readonly<WorkflowMetrics>;
  readonly phase: Phase;
  readonly iteration: number;
  readonly status: WorkflowStatus;
  readonly currentAgent?: NodeName;
  readonly retries: Readonly<RetryCounters>;
  readonly startedAt: string;
  readonly updatedAt: string;
}

/** One entry of a session's append-only checkpoint log */
export interface Checkpoint {
  sessionId: string;
  step: number;
  node: NodeName;
  next: RouteTarget;
  savedAt: string;
  state: WorkflowState;
}

export interface WorkflowSummary {
  phase: Phase;
  iteration: number;
  status: WorkflowStatus;
  errorCount: number;
  warningCount: number;
  filesCreated: string[];
  filesModified: string[];
  metrics: WorkflowMetrics;
  /** Milliseconds between session start and the last state update */
  elapsedTime: number;
}
