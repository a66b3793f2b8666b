import type { WorkflowState } from './states';
import { transitions } from './transitions';
import { transitionGuards } from './guards';
import { InvalidTransitionError } from './errors';

/**
 * Validate the phase change between two consecutive states.
 * @throws InvalidTransitionError when the change is not allowed.
 */
export function assertTransition(before: Readonly<WorkflowState>, after: Readonly<WorkflowState>): void {
  const from = before.phase;
  const to = after.phase;
  if (from === to) return;

  if (!transitions[from].includes(to)) {
    throw new InvalidTransitionError(from, to);
  }

  const guard = transitionGuards[to];
  if (guard && !guard(after)) {
    throw new InvalidTransitionError(from, to, 'rejected by guard logic');
  }
}
