import type { CommandRunner, DependencyInstaller, InstallResult } from './types';

/** Installs a requirements manifest with `<python> -m pip install -r` */
export class PipDependencyInstaller implements DependencyInstaller {
  constructor(
    private commands: CommandRunner,
    private python = 'python',
  ) {}

  async installFrom(manifestPath: string): Promise<InstallResult> {
    const result = await this.commands.run(`${this.python} -m pip install -r ${JSON.stringify(manifestPath)}`);
    if (result.success) {
      return { success: true, stdout: result.stdout, stderr: result.stderr };
    }

    const detail = result.error ?? (result.stderr.trim() || `exit code ${String(result.returnCode)}`);
    return {
      success: false,
      stdout: result.stdout,
      stderr: result.stderr,
      error: `Failed to install dependencies from ${manifestPath}: ${detail}`,
    };
  }
}
