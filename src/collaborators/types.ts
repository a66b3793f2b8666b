export type GenerationResult = { success: true; text: string; model?: string } | { success: false; error: string };

export interface GenerationClient {
  generate(prompt: string, maxTokens: number, temperature: number): Promise<GenerationResult>;
}

export interface CommandResult {
  success: boolean;
  returnCode: number | null;
  stdout: string;
  stderr: string;
  error?: string;
}

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
}

export interface CommandRunner {
  run(command: string, options?: RunOptions): Promise<CommandResult>;
  /** Run the test suite at `path` (a file or directory) */
  runTests(path: string): Promise<CommandResult>;
}

export interface SaveResult {
  success: boolean;
  path?: string;
  error?: string;
}

export interface ReadResult {
  success: boolean;
  content?: string;
  error?: string;
}

export interface FileStore {
  save(path: string, content: string, overwrite: boolean): Promise<SaveResult>;
  read(path: string): Promise<ReadResult>;
}

export interface InstallResult {
  success: boolean;
  stdout: string;
  stderr: string;
  error?: string;
}

export interface DependencyInstaller {
  installFrom(manifestPath: string): Promise<InstallResult>;
}

/** Everything a node may call outside the process */
export interface Collaborators {
  generation: GenerationClient;
  commands: CommandRunner;
  files: FileStore;
  dependencies: DependencyInstaller;
}
