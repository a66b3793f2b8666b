import type { PromptContext } from '../types';
import { formatIssues } from './issues';

export const getReviewPrompt = (ctx: PromptContext): string => `
ACT AS: Senior Code Reviewer
TASK: Review the implementation against its requirements.

### REQUIREMENTS
${ctx.requirements}

### CODE
${ctx.code ?? ''}

### TESTS
${ctx.tests ?? '(no tests)'}

### TEST COVERAGE
${ctx.testCoverage ?? 0}%
${formatIssues('Open errors', ctx.recentErrors)}
### OUTPUT REQUIREMENTS
Summarize the issues by severity, then end with these two lines:
Quality score: <1-10>/10
Verdict: APPROVED or NEEDS_REVISION
`;
