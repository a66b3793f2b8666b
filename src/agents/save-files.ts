import type { FileStore } from '../collaborators/types';
import { extractFiles } from '../extraction/extractor';
import type { NodeName, WorkflowState } from '../orchestrator/states';
import { addFilesCreated, addFilesModified, appendMessage, appendWarning } from '../orchestrator/workflow-state';

export interface SaveOutcome {
  state: WorkflowState;
  /** Names saved during this call, in extraction order */
  saved: string[];
}

/**
 * Extract files from generated text and write each one through the store.
 * A name created earlier in the session also counts as modified.
 */
export async function saveExtractedFiles(state: WorkflowState, agent: NodeName, text: string, files: FileStore, defaultLanguage?: string): Promise<SaveOutcome> {
  const extracted = extractFiles(text, { defaultLanguage });
  const saved: string[] = [];

  for (const [filename, content] of extracted) {
    const result = await files.save(filename, content, true);
    if (!result.success) {
      state = appendWarning(state, `Could not save ${filename}: ${result.error ?? 'unknown error'}`);
      continue;
    }

    if (state.filesCreated.includes(filename)) {
      state = addFilesModified(state, [filename]);
      state = appendMessage(state, agent, `Updated ${filename}`, 'info');
    } else {
      state = addFilesCreated(state, [filename]);
      state = appendMessage(state, agent, `Created ${filename}`, 'info');
    }
    saved.push(filename);
  }

  if (extracted.size === 0) {
    state = appendWarning(state, `${agent}: no valid code files extracted`);
    state = appendMessage(state, agent, 'No valid code files extracted', 'warning');
  }

  return { state, saved };
}
