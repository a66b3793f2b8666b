import type { PromptContext } from '../types';
import { formatIssues } from './issues';

export const getCodingPrompt = (ctx: PromptContext): string => `
ACT AS: Senior Software Engineer
TASK: Implement the requirement below.

### REQUIREMENTS
${ctx.requirements}

### PLAN
${ctx.plan ?? ''}
${formatIssues('Fix these specific issues', ctx.recentErrors)}${formatIssues('Address these review notes', ctx.recentWarnings)}
### OUTPUT REQUIREMENTS
Put every file in its own fenced code block whose first line names the file:

\`\`\`python
# File: app.py
...
\`\`\`

\`\`\`text
# File: requirements.txt
...
\`\`\`

Only list real dependencies. Make the code simple, working and complete. No placeholders.
`;
