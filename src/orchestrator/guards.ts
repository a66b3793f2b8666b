import type { Phase, WorkflowState } from './states';

export type GuardFn = (state: Readonly<WorkflowState>) => boolean;

// Entry conditions for phases that consume an earlier artifact
export const transitionGuards: Partial<Record<Phase, GuardFn>> = {
  coding: (state) => Boolean(state.plan?.trim()),
  testing: (state) => state.filesCreated.length > 0,
  reviewing: (state) => Boolean(state.code?.trim()),
};
