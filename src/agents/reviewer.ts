import type { NodeProfile } from './types';
import { appendMessage, withMetrics } from '../orchestrator/workflow-state';
import { getReviewPrompt } from './prompts/review';
import { fallbackReview } from './fallbacks';

export const APPROVED_SCORE = 90;
export const REJECTED_SCORE = 40;

const APPROVAL_MARKER = /(?<!\bNOT\s+)\bAPPROVED\b/;
const QUALITY_SCORE = /quality score\s*:?\s*(\d+(?:\.\d+)?)\s*\/\s*10\b/i;

/** Approval marker present as a whole word, not negated */
export function isApproved(review: string): boolean {
  return APPROVAL_MARKER.test(review);
}

export function scoreReview(review: string): number {
  return isApproved(review) ? APPROVED_SCORE : REJECTED_SCORE;
}

/** `quality score: N/10` scaled to 0-100, when present */
export function parseQualityScore(review: string): number | undefined {
  const match = QUALITY_SCORE.exec(review);
  if (!match?.[1]) return undefined;
  return Math.min(100, Math.round(Number(match[1]) * 10));
}

export const reviewerProfile: NodeProfile = {
  name: 'reviewer',
  phase: 'reviewing',
  artifact: 'review',
  messages: {
    start: 'Reviewing code...',
    generated: 'Review written',
    fallback: 'Using fallback review',
    done: 'Review completed',
  },
  buildPrompt: getReviewPrompt,
  fallback: (state, runtime) => fallbackReview(state, runtime.testPassThreshold),

  after(state, artifact) {
    const reviewScore = scoreReview(artifact);
    const codeQualityScore = parseQualityScore(artifact);
    state = withMetrics(state, codeQualityScore === undefined ? { reviewScore } : { reviewScore, codeQualityScore });
    const verdict = reviewScore === APPROVED_SCORE ? 'Review approved' : 'Review requested changes';
    return Promise.resolve(appendMessage(state, 'reviewer', verdict, reviewScore === APPROVED_SCORE ? 'success' : 'warning'));
  },
};
