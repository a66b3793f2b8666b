import type { NodeName } from '../orchestrator/states';
import type { NodeProfile } from './types';
import { plannerProfile } from './planner';
import { coderProfile } from './coder';
import { testerProfile } from './tester';
import { reviewerProfile } from './reviewer';

export const NODE_PROFILES: Record<NodeName, NodeProfile> = {
  planner: plannerProfile,
  coder: coderProfile,
  tester: testerProfile,
  reviewer: reviewerProfile,
};

export * from './types';
export { runNode, buildPromptContext } from './node-template';
export { isApproved, scoreReview, parseQualityScore } from './reviewer';
