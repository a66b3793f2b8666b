import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { WorkspaceFileStore } from '../../../src/collaborators/file-store';

describe('WorkspaceFileStore', () => {
  let root: string;
  let store: WorkspaceFileStore;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'codeloop-files-'));
    store = new WorkspaceFileStore(root);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should save under the root and read the content back', async () => {
    const saved = await store.save('calc.py', 'def add(a, b):\n    return a + b\n', true);
    const read = await store.read('calc.py');

    expect(saved).toEqual({ success: true, path: path.join(root, 'calc.py') });
    expect(read).toEqual({ success: true, content: 'def add(a, b):\n    return a + b\n' });
  });

  it('should create missing parent directories', async () => {
    await store.save('pkg/utils/helpers.py', 'X = 1', true);

    expect(await fs.readFile(path.join(root, 'pkg', 'utils', 'helpers.py'), 'utf-8')).toBe('X = 1');
  });

  it('should replace a file when overwrite is on', async () => {
    await store.save('main.py', 'old', true);
    await store.save('main.py', 'new', true);

    expect((await store.read('main.py')).content).toBe('new');
  });

  it('should keep an existing file when overwrite is off', async () => {
    await store.save('main.py', 'old', true);

    const result = await store.save('main.py', 'new', false);

    expect(result).toEqual({ success: false, error: 'File main.py already exists and overwrite is disabled' });
    expect((await store.read('main.py')).content).toBe('old');
  });

  it.each(['../outside.py', '/tmp/absolute.py', '   '])('should refuse to write %j', async (name) => {
    const result = await store.save(name, 'x', true);

    expect(result).toEqual({ success: false, error: `Refusing to write outside the workspace: ${name}` });
  });

  it('should report a missing file', async () => {
    expect(await store.read('nope.py')).toEqual({ success: false, error: 'File nope.py does not exist' });
  });

  it('should refuse to read outside the root', async () => {
    expect(await store.read('../../etc/hosts')).toEqual({ success: false, error: 'Refusing to read outside the workspace: ../../etc/hosts' });
  });
});
