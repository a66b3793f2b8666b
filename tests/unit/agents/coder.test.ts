import { runNode } from '../../../src/agents/node-template';
import { coderProfile } from '../../../src/agents/coder';
import { createInitialState, withFields } from '../../../src/orchestrator/workflow-state';
import type { WorkflowState } from '../../../src/orchestrator/states';
import { createFakeCollaborators, createRuntime } from '../../helpers/collaborators';

const CALC = ['```python', '# File: calc.py', 'def add(a, b):', '    return a + b', '```'].join('\n');

const planned = (requirements = 'Add two numbers'): WorkflowState => withFields(createInitialState(requirements), { plan: '1. Write calc.py', phase: 'coding' });

describe('coder node', () => {
  it('should save every extracted file and record it as created', async () => {
    const fakes = createFakeCollaborators();
    fakes.generate.mockResolvedValueOnce({ success: true, text: `${CALC}\n\n\`\`\`text\n# File: requirements.txt\npytest\n\`\`\`` });

    const state = await runNode(coderProfile, planned(), createRuntime(fakes.collaborators));

    expect(state.filesCreated).toEqual(['calc.py', 'requirements.txt']);
    expect(fakes.files.files.get('calc.py')).toBe('def add(a, b):\n    return a + b');
    expect(state.code).toContain('# File: calc.py');
    expect(state.messages.map((m) => m.text)).toEqual(['Writing code...', 'Code generated', 'Created calc.py', 'Created requirements.txt', 'Coding completed']);
  });

  it('should record a file written again as modified', async () => {
    const fakes = createFakeCollaborators();
    fakes.generate.mockResolvedValue({ success: true, text: CALC });
    const runtime = createRuntime(fakes.collaborators);

    const first = await runNode(coderProfile, planned(), runtime);
    const second = await runNode(coderProfile, first, runtime);

    expect(second.filesCreated).toEqual(['calc.py']);
    expect(second.filesModified).toEqual(['calc.py']);
    expect(second.messages.some((m) => m.text === 'Updated calc.py')).toBe(true);
  });

  it('should warn about a file that could not be saved', async () => {
    const fakes = createFakeCollaborators();
    fakes.generate.mockResolvedValueOnce({ success: true, text: CALC });
    jest.spyOn(fakes.files, 'save').mockResolvedValueOnce({ success: false, error: 'disk full' });

    const state = await runNode(coderProfile, planned(), createRuntime(fakes.collaborators));

    expect(state.filesCreated).toEqual([]);
    expect(state.warnings).toEqual(['Could not save calc.py: disk full']);
  });

  it('should warn when the response holds no code', async () => {
    const fakes = createFakeCollaborators();
    fakes.generate.mockResolvedValueOnce({ success: true, text: 'I am not able to help with that.' });

    const state = await runNode(coderProfile, planned(), createRuntime(fakes.collaborators));

    expect(state.filesCreated).toEqual([]);
    expect(state.warnings).toEqual(['coder: no valid code files extracted']);
    expect(state.messages.find((m) => m.text === 'No valid code files extracted')?.kind).toBe('warning');
  });

  it('should write the web fallback when generation fails for a FastAPI request', async () => {
    const fakes = createFakeCollaborators();

    const state = await runNode(coderProfile, planned('Build a FastAPI hello endpoint'), createRuntime(fakes.collaborators));

    expect(state.filesCreated).toEqual(['app.py', 'requirements.txt']);
    expect(fakes.files.files.get('requirements.txt')).toBe('fastapi\nuvicorn');
    expect(state.warnings).toEqual(['coder generation failed: connection refused']);
  });

  it('should write the script fallback otherwise', async () => {
    const fakes = createFakeCollaborators();

    const state = await runNode(coderProfile, planned(), createRuntime(fakes.collaborators));

    expect(state.filesCreated).toEqual(['main.py']);
  });
});
