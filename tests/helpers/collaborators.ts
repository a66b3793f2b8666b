import type { CommandResult, Collaborators, FileStore, GenerationResult, InstallResult, ReadResult, RunOptions, SaveResult } from '../../src/collaborators/types';
import type { NodeRuntime } from '../../src/agents/types';
import type { WorkflowLogger } from '../../src/orchestrator/logger';
import type { NodeName } from '../../src/orchestrator/states';
import { defaults } from '../../src/config/defaults';

// ── In-process stand-ins for the adapters ───────────────────────────────

export class MemoryFileStore implements FileStore {
  readonly files = new Map<string, string>();

  save(path: string, content: string, overwrite: boolean): Promise<SaveResult> {
    if (!overwrite && this.files.has(path)) {
      return Promise.resolve({ success: false, error: `File ${path} already exists and overwrite is disabled` });
    }
    this.files.set(path, content);
    return Promise.resolve({ success: true, path });
  }

  read(path: string): Promise<ReadResult> {
    const content = this.files.get(path);
    return Promise.resolve(content === undefined ? { success: false, error: `File ${path} does not exist` } : { success: true, content });
  }
}

export const PASSED: CommandResult = { success: true, returnCode: 0, stdout: '2 passed in 0.01s', stderr: '' };
export const FAILED: CommandResult = { success: false, returnCode: 1, stdout: 'FAILED test_main.py::test_add - assert 3 == 4', stderr: '' };

export interface FakeCollaborators {
  collaborators: Collaborators;
  generate: jest.Mock<Promise<GenerationResult>, [string, number, number]>;
  run: jest.Mock<Promise<CommandResult>, [string, RunOptions?]>;
  runTests: jest.Mock<Promise<CommandResult>, [string]>;
  installFrom: jest.Mock<Promise<InstallResult>, [string]>;
  files: MemoryFileStore;
}

/** Generation is offline and every command succeeds unless a test says otherwise */
export function createFakeCollaborators(): FakeCollaborators {
  const generate = jest.fn<Promise<GenerationResult>, [string, number, number]>().mockResolvedValue({ success: false, error: 'connection refused' });
  const run = jest.fn<Promise<CommandResult>, [string, RunOptions?]>().mockResolvedValue(PASSED);
  const runTests = jest.fn<Promise<CommandResult>, [string]>().mockResolvedValue(PASSED);
  const installFrom = jest.fn<Promise<InstallResult>, [string]>().mockResolvedValue({ success: true, stdout: 'Successfully installed', stderr: '' });
  const files = new MemoryFileStore();

  return {
    collaborators: { generation: { generate }, commands: { run, runTests }, files, dependencies: { installFrom } },
    generate,
    run,
    runTests,
    installFrom,
    files,
  };
}

export function createRuntime(collaborators: Collaborators): NodeRuntime {
  return {
    collaborators,
    agents: defaults.agents,
    maxErrorContext: defaults.workflow.max_error_context,
    testPassThreshold: defaults.workflow.test_pass_threshold,
    defaultLanguage: defaults.workflow.default_language,
  };
}

export function createSilentLogger(): jest.Mocked<WorkflowLogger> {
  return { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
}

// ── Scripted generation ─────────────────────────────────────────────────

const ROLES: Record<string, NodeName> = {
  'Software Architect': 'planner',
  'Senior Software Engineer': 'coder',
  'Test Engineer': 'tester',
  'Senior Code Reviewer': 'reviewer',
};

/** Which node a prompt was built for, read from its ACT AS line */
export function roleOf(prompt: string): NodeName | undefined {
  const match = /ACT AS: (.+)/.exec(prompt);
  return match?.[1] ? ROLES[match[1].trim()] : undefined;
}

export type Reply = string | ((call: number) => string);

/**
 * Answer each prompt with the reply scripted for its role. A role without
 * a reply gets a failed generation; `call` counts from 1 per role.
 */
export function scriptGeneration(generate: FakeCollaborators['generate'], replies: Partial<Record<NodeName, Reply>>): void {
  const calls: Record<NodeName, number> = { planner: 0, coder: 0, tester: 0, reviewer: 0 };

  generate.mockImplementation((prompt) => {
    const role = roleOf(prompt);
    const reply = role ? replies[role] : undefined;
    let result: GenerationResult = { success: false, error: 'no scripted reply' };
    if (role && reply !== undefined) {
      calls[role]++;
      result = { success: true, text: typeof reply === 'string' ? reply : reply(calls[role]) };
    }
    return Promise.resolve(result);
  });
}
