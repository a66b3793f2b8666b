import { END } from './states';
import type { NodeName, RouteTarget, WorkflowState } from './states';
import { advancePhase, appendMessage, endSession, withFields } from './workflow-state';

export interface RouterLimits {
  /** Failed test runs tolerated before the session is forced to end */
  maxCoderTesterRetries: number;
  /** Rejected reviews tolerated before the session is forced to end */
  maxReviewerRetries: number;
  /** testCoverage must be strictly greater than this to pass */
  testPassThreshold: number;
  /** reviewScore must be strictly greater than this to approve */
  reviewApprovalThreshold: number;
}

export const DEFAULT_ROUTER_LIMITS: RouterLimits = {
  maxCoderTesterRetries: 3,
  maxReviewerRetries: 5,
  testPassThreshold: 80,
  reviewApprovalThreshold: 70,
};

export interface RouteDecision {
  next: RouteTarget;
  state: WorkflowState;
}

const ROUTER_AGENT = 'router';

// ── Pure decisions ──────────────────────────────────────────────────────

export function decideAfterPlanner(state: Readonly<WorkflowState>): RouteTarget {
  return state.plan?.trim() ? 'coder' : END;
}

export function decideAfterCoder(state: Readonly<WorkflowState>, limits: RouterLimits): RouteTarget {
  if (state.filesCreated.length === 0) return END;
  if (state.retries.coderTester > limits.maxCoderTesterRetries) return 'reviewer';
  return 'tester';
}

export function testsPassed(state: Readonly<WorkflowState>, limits: RouterLimits): boolean {
  return (state.metrics.testCoverage ?? 0) > limits.testPassThreshold;
}

export function reviewApproved(state: Readonly<WorkflowState>, limits: RouterLimits): boolean {
  return (state.metrics.reviewScore ?? 0) > limits.reviewApprovalThreshold;
}

/** Expects the counters already updated by recordTesterOutcome */
export function decideAfterTester(state: Readonly<WorkflowState>, limits: RouterLimits): RouteTarget {
  if (testsPassed(state, limits)) return 'reviewer';
  return state.retries.coderTester > limits.maxCoderTesterRetries ? END : 'coder';
}

/** Expects the counters already updated by recordReviewOutcome */
export function decideAfterReviewer(state: Readonly<WorkflowState>, limits: RouterLimits): RouteTarget {
  if (reviewApproved(state, limits)) return END;
  return state.retries.reviewerCoder > limits.maxReviewerRetries ? END : 'coder';
}

// ── Counter mutations ───────────────────────────────────────────────────

export function recordTesterOutcome(state: WorkflowState, limits: RouterLimits): WorkflowState {
  if (testsPassed(state, limits)) {
    return withFields(state, { retries: { ...state.retries, coderTester: 0 } });
  }
  return withFields(state, {
    retries: { ...state.retries, coderTester: state.retries.coderTester + 1 },
    iteration: state.iteration + 1,
  });
}

export function recordReviewOutcome(state: WorkflowState, limits: RouterLimits): WorkflowState {
  if (reviewApproved(state, limits)) return state;
  return withFields(state, {
    retries: { ...state.retries, reviewerCoder: state.retries.reviewerCoder + 1 },
    iteration: state.iteration + 1,
    status: 'needs_revision',
  });
}

// ── Router ──────────────────────────────────────────────────────────────

/**
 * Picks the node that runs after `node` returned `state`.
 *
 * Each call runs three explicit steps: record the outcome in the retry
 * counters, decide the next target from the updated state (pure), then
 * settle the state for that target (phase advance or terminal status).
 */
export class Router {
  constructor(private limits: RouterLimits = DEFAULT_ROUTER_LIMITS) {}

  getLimits(): RouterLimits {
    return { ...this.limits };
  }

  route(node: NodeName, state: WorkflowState): RouteDecision {
    switch (node) {
      case 'planner':
        return this.fromPlanner(state);
      case 'coder':
        return this.fromCoder(state);
      case 'tester':
        return this.fromTester(state);
      case 'reviewer':
        return this.fromReviewer(state);
    }
  }

  private fromPlanner(state: WorkflowState): RouteDecision {
    const next = decideAfterPlanner(state);
    if (next === END) {
      return { next, state: endSession(state, ROUTER_AGENT, 'Planner produced an empty plan', 'failed') };
    }
    return { next, state: advancePhase(state) };
  }

  private fromCoder(state: WorkflowState): RouteDecision {
    const next = decideAfterCoder(state, this.limits);
    if (next === END) {
      return { next, state: endSession(state, ROUTER_AGENT, 'No files were created; nothing to test', 'failed') };
    }
    if (next === 'reviewer') {
      let settled = appendMessage(state, ROUTER_AGENT, 'Retry cap reached; skipping tests and finalizing', 'warning');
      settled = withFields(settled, { phase: 'reviewing' });
      return { next, state: settled };
    }
    return { next, state: advancePhase(state) };
  }

  private fromTester(state: WorkflowState): RouteDecision {
    const counted = recordTesterOutcome(state, this.limits);
    const next = decideAfterTester(counted, this.limits);

    if (next === 'reviewer') {
      return { next, state: advancePhase(counted) };
    }
    if (next === END) {
      const reason = `Coder/tester retry cap exceeded after ${counted.retries.coderTester} failed test runs`;
      return { next, state: endSession(counted, ROUTER_AGENT, reason, 'complete') };
    }
    return { next, state: appendMessage(counted, ROUTER_AGENT, `Tests failed; retrying coder (attempt ${counted.retries.coderTester}/${this.limits.maxCoderTesterRetries})`, 'warning') };
  }

  private fromReviewer(state: WorkflowState): RouteDecision {
    const counted = recordReviewOutcome(state, this.limits);
    const next = decideAfterReviewer(counted, this.limits);

    if (next === END && reviewApproved(counted, this.limits)) {
      return { next, state: advancePhase(counted) };
    }
    if (next === END) {
      const reason = `Reviewer/coder retry cap exceeded after ${counted.retries.reviewerCoder} rejected reviews`;
      return { next, state: endSession(counted, ROUTER_AGENT, reason, 'complete') };
    }
    return { next, state: appendMessage(counted, ROUTER_AGENT, `Review requested changes; revising (attempt ${counted.retries.reviewerCoder}/${this.limits.maxReviewerRetries})`, 'warning') };
  }
}
