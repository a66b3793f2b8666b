import type { NodeProfile } from './types';
import { getCodingPrompt } from './prompts/coding';
import { fallbackCode } from './fallbacks';
import { saveExtractedFiles } from './save-files';

export const coderProfile: NodeProfile = {
  name: 'coder',
  phase: 'coding',
  artifact: 'code',
  messages: {
    start: 'Writing code...',
    generated: 'Code generated',
    fallback: 'Using fallback code',
    done: 'Coding completed',
  },
  buildPrompt: getCodingPrompt,
  fallback: (state) => fallbackCode(state.requirements),

  async after(state, artifact, runtime) {
    const { state: next } = await saveExtractedFiles(state, 'coder', artifact, runtime.collaborators.files, runtime.defaultLanguage);
    return next;
  },
};
