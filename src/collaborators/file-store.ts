import fs from 'fs/promises';
import path from 'path';
import type { FileStore, ReadResult, SaveResult } from './types';
import { describeError } from '../orchestrator/errors';

/** FileStore rooted at a workspace directory; paths resolve against the root */
export class WorkspaceFileStore implements FileStore {
  private root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  getRoot(): string {
    return this.root;
  }

  async save(filePath: string, content: string, overwrite: boolean): Promise<SaveResult> {
    const target = this.resolve(filePath);
    if (!target) {
      return { success: false, error: `Refusing to write outside the workspace: ${filePath}` };
    }

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content, { encoding: 'utf-8', flag: overwrite ? 'w' : 'wx' });
      return { success: true, path: target };
    } catch (error) {
      if (hasCode(error, 'EEXIST')) {
        return { success: false, error: `File ${filePath} already exists and overwrite is disabled` };
      }
      return { success: false, error: `Failed to save file ${filePath}: ${describeError(error)}` };
    }
  }

  async read(filePath: string): Promise<ReadResult> {
    const target = this.resolve(filePath);
    if (!target) {
      return { success: false, error: `Refusing to read outside the workspace: ${filePath}` };
    }

    try {
      const content = await fs.readFile(target, 'utf-8');
      return { success: true, content };
    } catch (error) {
      if (hasCode(error, 'ENOENT')) {
        return { success: false, error: `File ${filePath} does not exist` };
      }
      return { success: false, error: `Failed to read file ${filePath}: ${describeError(error)}` };
    }
  }

  /** Absolute path inside the root, or undefined when `filePath` escapes it */
  private resolve(filePath: string): string | undefined {
    if (!filePath.trim()) return undefined;
    const target = path.resolve(this.root, filePath);
    const relative = path.relative(this.root, target);
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) return undefined;
    return target;
  }
}

function hasCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
