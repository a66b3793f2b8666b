import type { PromptContext } from '../types';

const WEB_KEYWORDS = ['fastapi', 'flask', 'web', 'api', 'server', 'express'];

export function looksLikeWebApp(requirements: string): boolean {
  const lowered = requirements.toLowerCase();
  return WEB_KEYWORDS.some((word) => lowered.includes(word));
}

export const getPlanningPrompt = (ctx: PromptContext): string => {
  const isWebApp = looksLikeWebApp(ctx.requirements);
  const isSimple = ctx.requirements.trim().split(/\s+/).length < 10;

  return `
ACT AS: Software Architect
TASK: Create a focused implementation plan.

### REQUIREMENTS
${ctx.requirements}

### ANALYSIS
- Type: ${isWebApp ? 'Web application' : 'Script'}
- Complexity: ${isSimple ? 'Simple' : 'Moderate'}

### OUTPUT REQUIREMENTS
1. Main approach (2-3 sentences)
2. Key files needed (name them specifically)
3. Dependencies required
4. Testing approach

Keep it concise and actionable.
`;
};
