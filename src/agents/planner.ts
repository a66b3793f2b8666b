import type { NodeProfile } from './types';
import { getPlanningPrompt } from './prompts/planning';
import { fallbackPlan } from './fallbacks';

export const plannerProfile: NodeProfile = {
  name: 'planner',
  phase: 'planning',
  artifact: 'plan',
  messages: {
    start: 'Analyzing requirements...',
    generated: 'Plan created successfully',
    fallback: 'Using fallback plan',
    done: 'Planning completed',
  },
  buildPrompt: getPlanningPrompt,
  fallback: (state) => fallbackPlan(state.requirements),
};
