/** Language tag → file extension (without dot) */
const EXTENSIONS: Record<string, string> = {
  python: 'py',
  python3: 'py',
  py: 'py',
  javascript: 'js',
  js: 'js',
  node: 'js',
  jsx: 'jsx',
  typescript: 'ts',
  ts: 'ts',
  tsx: 'tsx',
  html: 'html',
  css: 'css',
  json: 'json',
  yaml: 'yaml',
  yml: 'yml',
  toml: 'toml',
  ini: 'ini',
  sql: 'sql',
  markdown: 'md',
  md: 'md',
  bash: 'sh',
  sh: 'sh',
  shell: 'sh',
  zsh: 'sh',
  php: 'php',
  text: 'txt',
  txt: 'txt',
  plaintext: 'txt',
};

const CANONICAL_BASENAMES: Record<string, string> = {
  html: 'index',
};

export const DEFAULT_LANGUAGE = 'python';

/**
 * Resolve a fence language tag to an extension. Untagged regions use the
 * default language; unknown alphanumeric tags are used as the extension
 * themselves, anything else becomes txt.
 */
export function extensionFor(language: string | undefined, defaultLanguage: string = DEFAULT_LANGUAGE): string {
  const tag = (language ?? '').trim().toLowerCase() || defaultLanguage.toLowerCase();
  const known = EXTENSIONS[tag];
  if (known) return known;
  return /^[a-z0-9]+$/.test(tag) ? tag : 'txt';
}

export function canonicalFilename(extension: string): string {
  return `${CANONICAL_BASENAMES[extension] ?? 'main'}.${extension}`;
}

/**
 * Hands out default names in scan order: the first unresolved region gets
 * the canonical name for its extension, later ones file_1, file_2, … with
 * one counter shared by every extension.
 */
export class PositionalNamer {
  private issued = 0;

  constructor(private defaultLanguage: string = DEFAULT_LANGUAGE) {}

  next(language: string | undefined): string {
    const extension = extensionFor(language, this.defaultLanguage);
    const position = this.issued++;
    return position === 0 ? canonicalFilename(extension) : `file_${position}.${extension}`;
  }
}
