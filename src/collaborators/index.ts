import path from 'path';
import type { Config } from '../config/validator';
import type { WorkflowLogger } from '../orchestrator/logger';
import { ChatCompletionsClient } from './chat-completions-client';
import { ShellCommandRunner } from './shell-runner';
import { WorkspaceFileStore } from './file-store';
import { PipDependencyInstaller } from './dependency-installer';
import type { Collaborators } from './types';

export * from './types';
export { ChatCompletionsClient } from './chat-completions-client';
export { ShellCommandRunner, DEFAULT_COMMAND_TIMEOUT_MS } from './shell-runner';
export { WorkspaceFileStore } from './file-store';
export { PipDependencyInstaller } from './dependency-installer';

/** Wire the default adapters; every one of them works inside the workspace root */
export function createDefaultCollaborators(config: Config, logger?: WorkflowLogger): Collaborators {
  const root = path.resolve(config.workspace.root);
  const commands = new ShellCommandRunner({
    cwd: root,
    python: config.commands.python,
    testArgs: config.commands.test_args,
    timeoutMs: config.commands.timeout_ms,
  });

  return {
    generation: new ChatCompletionsClient({
      baseUrl: config.llm.base_url,
      apiKey: config.llm.api_key,
      model: config.llm.model,
      timeoutMs: config.llm.timeout_ms,
      maxRetries: config.llm.max_retries,
      logger,
    }),
    commands,
    files: new WorkspaceFileStore(root),
    dependencies: new PipDependencyInstaller(commands, config.commands.python),
  };
}
