/**
 * Integration tests for a full session.
 *
 * Sessions run through the real agents, router and checkpoint files with a
 * real workspace on disk. Only generation and the command runner are
 * replaced with in-process stand-ins.
 */
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { SessionManager } from '../../../src/orchestrator/session-manager';
import { WorkspaceFileStore } from '../../../src/collaborators/file-store';
import { FileCheckpointStore } from '../../../src/orchestrator/state-store';
import { defaults } from '../../../src/config/defaults';
import type { Config } from '../../../src/config/validator';
import type { NodeName } from '../../../src/orchestrator/states';
import { FAILED, createFakeCollaborators, createSilentLogger, roleOf, scriptGeneration } from '../../helpers/collaborators';
import type { FakeCollaborators, Reply } from '../../helpers/collaborators';

// ── Fixtures ────────────────────────────────────────────────────────────

const PLAN = '1. Write calc.py with add(a, b)\n2. Test it with pytest';
const CALC = '```python\n# File: calc.py\ndef add(a, b):\n    return a + b\n```';
const TESTS = '```python\n# File: test_calc.py\nfrom calc import add\n\n\ndef test_add():\n    assert add(1, 2) == 3\n```';
const APPROVED = 'No blocking issues.\nQuality score: 9/10\nVerdict: APPROVED';
const REJECTED = 'add() ignores non-numeric input.\nQuality score: 4/10\nVerdict: NEEDS_REVISION';

// ── Helpers ─────────────────────────────────────────────────────────────

interface Harness {
  manager: SessionManager;
  fakes: FakeCollaborators;
  workspace: string;
  checkpointDir: string;
}

let tmp: string;

beforeEach(async () => {
  tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'codeloop-session-'));
});

afterEach(async () => {
  await fs.rm(tmp, { recursive: true, force: true });
});

function createHarness(replies: Partial<Record<NodeName, Reply>>): Harness {
  const workspace = path.join(tmp, 'workspace');
  const checkpointDir = path.join(tmp, '.codeloop');
  const config: Config = { ...defaults, workspace: { root: workspace, checkpoint_dir: checkpointDir } };

  const fakes = createFakeCollaborators();
  scriptGeneration(fakes.generate, replies);

  const manager = SessionManager.fromConfig(config, {
    collaborators: { ...fakes.collaborators, files: new WorkspaceFileStore(workspace) },
    logger: createSilentLogger(),
  });

  return { manager, fakes, workspace, checkpointDir };
}

async function runCollectingNodes(manager: SessionManager, sessionId: string): Promise<NodeName[]> {
  const nodes: NodeName[] = [];
  for await (const update of manager.stream(sessionId)) {
    nodes.push(update.node);
  }
  return nodes;
}

function promptsFor(fakes: FakeCollaborators, role: NodeName): string[] {
  return fakes.generate.mock.calls.map(([prompt]) => prompt).filter((prompt) => roleOf(prompt) === role);
}

// ═══════════════════════════════════════════════════════════════════════
// Sessions
// ═══════════════════════════════════════════════════════════════════════

describe('Workflow session (integration)', () => {
  it('should plan, write, test and approve in four steps', async () => {
    const { manager, fakes, workspace } = createHarness({ planner: PLAN, coder: CALC, tester: TESTS, reviewer: APPROVED });
    const id = manager.start('Write an add(a, b) function in Python');

    const nodes = await runCollectingNodes(manager, id);
    const summary = manager.summary(id);

    expect(nodes).toEqual(['planner', 'coder', 'tester', 'reviewer']);
    expect(summary).toMatchObject({
      phase: 'complete',
      status: 'completed',
      iteration: 1,
      errorCount: 0,
      warningCount: 0,
      filesCreated: ['calc.py', 'test_calc.py'],
      metrics: { testCoverage: 100, reviewScore: 90, codeQualityScore: 90 },
    });
    expect(await fs.readFile(path.join(workspace, 'calc.py'), 'utf-8')).toBe('def add(a, b):\n    return a + b');
    expect(fakes.runTests).toHaveBeenCalledWith('test_calc.py');
  });

  it('should pass the plan to the coder and the code to the reviewer', async () => {
    const { manager, fakes } = createHarness({ planner: PLAN, coder: CALC, tester: TESTS, reviewer: APPROVED });

    await manager.run(manager.start('Write an add(a, b) function in Python'));

    expect(promptsFor(fakes, 'coder')[0]).toContain(PLAN);
    expect(promptsFor(fakes, 'reviewer')[0]).toContain('# File: calc.py');
    expect(promptsFor(fakes, 'reviewer')[0]).toContain('### TEST COVERAGE\n100%');
  });

  it('should send failing tests back to the coder with the failure output', async () => {
    const { manager, fakes } = createHarness({ planner: PLAN, coder: CALC, tester: TESTS, reviewer: APPROVED });
    fakes.runTests.mockResolvedValueOnce(FAILED).mockResolvedValueOnce(FAILED);
    const id = manager.start('Write an add(a, b) function in Python');

    const nodes = await runCollectingNodes(manager, id);
    const summary = manager.summary(id);

    expect(nodes).toEqual(['planner', 'coder', 'tester', 'coder', 'tester', 'coder', 'tester', 'reviewer']);
    expect(promptsFor(fakes, 'coder')[1]).toContain('- Test failure: FAILED test_main.py::test_add - assert 3 == 4');
    expect(summary).toMatchObject({ status: 'completed', iteration: 3, errorCount: 2, filesModified: ['calc.py', 'test_calc.py'] });
  });

  it('should revise after a rejected review', async () => {
    const { manager } = createHarness({ planner: PLAN, coder: CALC, tester: TESTS, reviewer: (call) => (call === 1 ? REJECTED : APPROVED) });
    const id = manager.start('Write an add(a, b) function in Python');

    const nodes = await runCollectingNodes(manager, id);

    expect(nodes).toEqual(['planner', 'coder', 'tester', 'reviewer', 'coder', 'tester', 'reviewer']);
    expect(manager.summary(id)).toMatchObject({ status: 'completed', iteration: 2, metrics: { reviewScore: 90, codeQualityScore: 90 } });
    expect(manager.getSession(id).state.retries.reviewerCoder).toBe(1);
  });

  it('should fail without testing when the coder writes no files', async () => {
    const { manager, fakes } = createHarness({ planner: PLAN, coder: 'I would need more details before writing this.' });
    const id = manager.start('Write an add(a, b) function in Python');

    const nodes = await runCollectingNodes(manager, id);

    expect(nodes).toEqual(['planner', 'coder']);
    expect(manager.summary(id).status).toBe('failed');
    expect(manager.getSession(id).state.errors).toEqual(['No files were created; nothing to test']);
    expect(fakes.runTests).not.toHaveBeenCalled();
  });

  it('should end at the retry cap when generation is down and tests keep failing', async () => {
    const { manager, fakes, workspace } = createHarness({});
    fakes.runTests.mockResolvedValue(FAILED);
    const id = manager.start('Print a greeting');

    const nodes = await runCollectingNodes(manager, id);
    const { state } = manager.getSession(id);

    expect(nodes).toHaveLength(9);
    expect(nodes).not.toContain('reviewer');
    expect(state.phase).toBe('complete');
    expect(state.status).toBe('completed');
    expect(state.errors).toHaveLength(5);
    expect(state.errors[4]).toBe('Coder/tester retry cap exceeded after 4 failed test runs');
    expect(state.filesCreated).toEqual(['main.py', 'test_main.py']);
    expect(await fs.readFile(path.join(workspace, 'test_main.py'), 'utf-8')).toContain('def test_import_main():');
  });

  it('should resume from the checkpoint files', async () => {
    const first = createHarness({ planner: PLAN, coder: CALC, tester: TESTS, reviewer: APPROVED });
    const id = first.manager.start('Write an add(a, b) function in Python');
    for await (const update of first.manager.stream(id)) {
      if (update.node === 'coder') break;
    }

    const second = createHarness({ planner: PLAN, coder: CALC, tester: TESTS, reviewer: APPROVED });
    const result = await second.manager.resume(id);
    const log = await new FileCheckpointStore(second.checkpointDir).list(id);

    expect(promptsFor(second.fakes, 'planner')).toHaveLength(0);
    expect(promptsFor(second.fakes, 'coder')).toHaveLength(0);
    expect(result.status).toBe('completed');
    expect(log.map((c) => c.node)).toEqual(['planner', 'coder', 'tester', 'reviewer']);
  });
});
