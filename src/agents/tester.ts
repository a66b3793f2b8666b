import type { NodeProfile } from './types';
import type { CommandResult } from '../collaborators/types';
import { isTestFilename } from '../extraction/extractor';
import { appendError, appendMessage, withMetrics } from '../orchestrator/workflow-state';
import { getTestingPrompt } from './prompts/testing';
import { fallbackTests } from './fallbacks';
import { saveExtractedFiles } from './save-files';

export const REQUIREMENTS_MANIFEST = 'requirements.txt';

function describeFailure(result: CommandResult): string {
  const output = `${result.stderr}\n${result.stdout}`.trim();
  return output || result.error || `exit code ${String(result.returnCode)}`;
}

export const testerProfile: NodeProfile = {
  name: 'tester',
  phase: 'testing',
  artifact: 'tests',
  messages: {
    start: 'Running tests...',
    generated: 'Tests generated',
    fallback: 'Using fallback smoke tests',
    done: 'Testing completed',
  },
  buildPrompt: getTestingPrompt,
  fallback: (state) => fallbackTests(state),

  async before(state, runtime) {
    if (!state.filesCreated.includes(REQUIREMENTS_MANIFEST)) return { state };

    state = appendMessage(state, 'tester', 'Installing dependencies...', 'info');
    const install = await runtime.collaborators.dependencies.installFrom(REQUIREMENTS_MANIFEST);
    if (install.success) return { state };

    const error = `Dependency error: ${install.stderr.trim() || install.error || 'Unknown error'}`;
    state = appendMessage(state, 'tester', error, 'error');
    state = appendError(state, error);
    return { state: withMetrics(state, { testCoverage: 0 }), halt: true };
  },

  async after(state, artifact, runtime) {
    const outcome = await saveExtractedFiles(state, 'tester', artifact, runtime.collaborators.files, runtime.defaultLanguage);
    state = outcome.state;

    const target = outcome.saved.find(isTestFilename) ?? '.';
    const result = await runtime.collaborators.commands.runTests(target);

    if (result.success && result.returnCode === 0) {
      state = appendMessage(state, 'tester', 'Tests passed!', 'success');
      return withMetrics(state, { testCoverage: 100 });
    }

    state = appendMessage(state, 'tester', 'Tests failed', 'error');
    state = appendError(state, `Test failure: ${describeFailure(result)}`);
    return withMetrics(state, { testCoverage: 0 });
  },
};
