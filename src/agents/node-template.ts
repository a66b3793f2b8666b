import type { WorkflowState } from '../orchestrator/states';
import { appendMessage, appendWarning, withFields } from '../orchestrator/workflow-state';
import type { ArtifactField, NodeProfile, NodeRuntime, PromptContext } from './types';

export const MAX_CONTEXT_ENTRY_LENGTH = 500;

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

function recent(entries: readonly string[], count: number): string[] {
  if (count <= 0) return [];
  return entries.slice(-count).map((entry) => truncate(entry, MAX_CONTEXT_ENTRY_LENGTH));
}

export function buildPromptContext(state: Readonly<WorkflowState>, maxErrorContext: number): PromptContext {
  return {
    requirements: state.requirements,
    plan: state.plan,
    code: state.code,
    tests: state.tests,
    filesCreated: state.filesCreated,
    testCoverage: state.metrics.testCoverage,
    iteration: state.iteration,
    recentErrors: recent(state.errors, maxErrorContext),
    recentWarnings: recent(state.warnings, maxErrorContext),
  };
}

function withArtifact(state: WorkflowState, field: ArtifactField, text: string): WorkflowState {
  switch (field) {
    case 'plan':
      return withFields(state, { plan: text });
    case 'code':
      return withFields(state, { code: text });
    case 'tests':
      return withFields(state, { tests: text });
    case 'review':
      return withFields(state, { review: text });
  }
}

/**
 * Run one role against the state.
 *
 * Generation failures never escape: the profile's fallback artifact takes
 * the place of the text and a warning records why.
 */
export async function runNode(profile: NodeProfile, input: Readonly<WorkflowState>, runtime: NodeRuntime): Promise<WorkflowState> {
  const settings = runtime.agents[profile.name];
  let state = withFields(input, { currentAgent: profile.name, phase: profile.phase });
  state = appendMessage(state, profile.name, profile.messages.start, 'thinking');

  if (profile.before) {
    const hook = await profile.before(state, runtime);
    state = hook.state;
    if (hook.halt) return state;
  }

  const prompt = profile.buildPrompt(buildPromptContext(state, runtime.maxErrorContext));
  const result = await runtime.collaborators.generation.generate(prompt, settings.max_tokens, settings.temperature);

  let artifact: string;
  if (result.success && result.text.trim()) {
    artifact = result.text;
    state = appendMessage(state, profile.name, profile.messages.generated, 'success');
  } else {
    const reason = result.success ? 'empty response' : result.error;
    runtime.logger?.warn(`${profile.name} generation failed, using fallback`, { reason });
    artifact = profile.fallback(state, runtime);
    state = appendWarning(state, `${profile.name} generation failed: ${reason}`);
    state = appendMessage(state, profile.name, profile.messages.fallback, 'warning');
  }

  state = withArtifact(state, profile.artifact, artifact);

  if (profile.after) {
    state = await profile.after(state, artifact, runtime);
  }

  return appendMessage(state, profile.name, profile.messages.done, 'success');
}
