import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import type { CommandResult, CommandRunner, RunOptions } from './types';

export interface ShellCommandRunnerOptions {
  /** Working directory when a call gives none */
  cwd: string;
  /** Interpreter used for the test runner (default: python) */
  python?: string;
  testArgs?: string[];
  timeoutMs?: number;
}

export const DEFAULT_COMMAND_TIMEOUT_MS = 300_000;

/**
 * Runs shell commands and reports the outcome as a CommandResult.
 * Spawn errors and timeouts resolve as failures; nothing rejects.
 */
export class ShellCommandRunner implements CommandRunner {
  private python: string;
  private testArgs: string[];
  private timeoutMs: number;

  constructor(private options: ShellCommandRunnerOptions) {
    this.python = options.python ?? 'python';
    this.testArgs = options.testArgs ?? ['-v'];
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  }

  run(command: string, options: RunOptions = {}): Promise<CommandResult> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    return new Promise((resolve) => {
      // own process group; a timeout kills the group
      const child = spawn(command, { cwd: options.cwd ?? this.options.cwd, shell: true, detached: GROUP_KILL });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (result: CommandResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      const timer = setTimeout(() => {
        killTree(child);
        finish({ success: false, returnCode: null, stdout, stderr, error: `Command timed out after ${Math.round(timeoutMs / 1000)} seconds` });
      }, timeoutMs);

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (err: NodeJS.ErrnoException) => {
        finish({ success: false, returnCode: null, stdout, stderr, error: `Failed to execute command: ${err.message}` });
      });

      child.on('close', (code: number | null) => {
        finish({ success: code === 0, returnCode: code, stdout, stderr });
      });
    });
  }

  runTests(path: string): Promise<CommandResult> {
    const command = [this.python, '-m', 'pytest', ...this.testArgs, quote(path)].join(' ');
    return this.run(command);
  }
}

const GROUP_KILL = process.platform !== 'win32';

function killTree(child: ChildProcess): void {
  if (GROUP_KILL && child.pid !== undefined) {
    try {
      process.kill(-child.pid, 'SIGKILL');
      return;
    } catch {
      // group already gone; fall through to the shell itself
    }
  }
  child.kill('SIGKILL');
}

function quote(arg: string): string {
  return /^[\w./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}
