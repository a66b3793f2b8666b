import type { MessageKind, WorkflowMetrics, WorkflowState, WorkflowSummary } from './states';
import { PHASE_ORDER } from './transitions';

type StateFields = Partial<Omit<WorkflowState, 'requirements' | 'startedAt' | 'updatedAt'>>;

export function createInitialState(requirements: string, now: Date = new Date()): WorkflowState {
  const timestamp = now.toISOString();
  return {
    requirements,
    messages: [],
    errors: [],
    warnings: [],
    filesCreated: [],
    filesModified: [],
    metrics: {},
    phase: 'planning',
    iteration: 1,
    status: 'in_progress',
    retries: { coderTester: 0, reviewerCoder: 0 },
    startedAt: timestamp,
    updatedAt: timestamp,
  };
}

/** Shallow merge that never touches the input and bumps updatedAt */
export function withFields(state: WorkflowState, fields: StateFields): WorkflowState {
  return { ...state, ...fields, updatedAt: new Date().toISOString() };
}

export function appendMessage(state: WorkflowState, agent: string, text: string, kind: MessageKind = 'info'): WorkflowState {
  const message = { agent, text, kind, timestamp: new Date().toISOString() };
  return withFields(state, { messages: [...state.messages, message] });
}

export function appendError(state: WorkflowState, error: string): WorkflowState {
  return withFields(state, { errors: [...state.errors, error] });
}

export function appendWarning(state: WorkflowState, warning: string): WorkflowState {
  return withFields(state, { warnings: [...state.warnings, warning] });
}

export function addFilesCreated(state: WorkflowState, names: readonly string[]): WorkflowState {
  return withFields(state, { filesCreated: union(state.filesCreated, names) });
}

export function addFilesModified(state: WorkflowState, names: readonly string[]): WorkflowState {
  return withFields(state, { filesModified: union(state.filesModified, names) });
}

export function withMetrics(state: WorkflowState, metrics: WorkflowMetrics): WorkflowState {
  return withFields(state, { metrics: { ...state.metrics, ...metrics } });
}

/**
 * Move to the next phase of the fixed order. A phase outside the table
 * (failed) falls through to complete.
 */
export function advancePhase(state: WorkflowState): WorkflowState {
  const index = PHASE_ORDER.indexOf(state.phase);
  const next = index >= 0 ? (PHASE_ORDER[index + 1] ?? 'complete') : 'complete';
  return withFields(state, {
    phase: next,
    status: next === 'complete' ? 'completed' : 'in_progress',
  });
}

/**
 * Terminal mutation: record `reason` as an error (and as an error message
 * from `agent`) and close the session as failed or complete.
 */
export function endSession(state: WorkflowState, agent: string, reason: string, outcome: 'failed' | 'complete'): WorkflowState {
  const recorded = appendMessage(appendError(state, reason), agent, reason, 'error');
  return withFields(recorded, outcome === 'failed' ? { phase: 'failed', status: 'failed' } : { phase: 'complete', status: 'completed' });
}

export function getWorkflowSummary(state: WorkflowState): WorkflowSummary {
  const started = Date.parse(state.startedAt);
  const updated = Date.parse(state.updatedAt);
  const elapsedTime = Number.isFinite(started) && Number.isFinite(updated) ? Math.max(0, updated - started) : 0;

  return {
    phase: state.phase,
    iteration: state.iteration,
    status: state.status,
    errorCount: state.errors.length,
    warningCount: state.warnings.length,
    filesCreated: [...state.filesCreated],
    filesModified: [...state.filesModified],
    metrics: { ...state.metrics },
    elapsedTime,
  };
}

function union(existing: readonly string[], added: readonly string[]): string[] {
  const merged = [...existing];
  for (const name of added) {
    if (!merged.includes(name)) merged.push(name);
  }
  return merged;
}
