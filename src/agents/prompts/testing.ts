import type { PromptContext } from '../types';
import { formatIssues } from './issues';

export const getTestingPrompt = (ctx: PromptContext): string => `
ACT AS: Test Engineer
TASK: Write pytest tests for the code below.

### REQUIREMENTS
${ctx.requirements}

### FILES
${ctx.filesCreated.join(', ') || '(none)'}

### CODE
${ctx.code ?? ''}
${formatIssues('Previous failures', ctx.recentErrors)}
### OUTPUT REQUIREMENTS
Return one fenced code block starting with \`# File: test_<module>.py\`.
Import the modules under test by file name. Cover normal use and edge cases.
`;
