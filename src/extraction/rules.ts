/**
 * A content signature that maps a region to a well-known filename.
 * Rules are tried in list order; the first match names the region.
 */
export interface DetectionRule {
  name: string;
  matches(content: string, language?: string): boolean;
  filename(content: string, language?: string): string;
}

const PYTHON_TAGS = ['', 'python', 'python3', 'py'];
const SCRIPT_TAGS = ['', 'javascript', 'js', 'node', 'jsx', 'typescript', 'ts', 'tsx'];
const MANIFEST_TAGS = ['', 'text', 'txt', 'plaintext', 'requirements', 'pip'];

const KNOWN_PACKAGES = new Set(['requests', 'fastapi', 'flask', 'uvicorn', 'pytest', 'httpx', 'pydantic', 'django', 'numpy', 'pandas', 'sqlalchemy', 'jinja2', 'click']);
const REQUIREMENT_LINE = /^([A-Za-z0-9][A-Za-z0-9._-]*)(\[[^\]]*\])?\s*((?:==|>=|<=|~=|!=|>|<)\s*[\w.*+-]+\s*,?\s*)*$/;

function tag(language?: string): string {
  return (language ?? '').trim().toLowerCase();
}

function isTypeScript(language?: string): boolean {
  return ['typescript', 'ts', 'tsx'].includes(tag(language));
}

export const pytestRule: DetectionRule = {
  name: 'pytest',
  matches: (content, language) => PYTHON_TAGS.includes(tag(language)) && (/^\s*import pytest\b/m.test(content) || /^\s*def test_\w*\s*\(/m.test(content)),
  filename: () => 'test_main.py',
};

export const scriptTestRule: DetectionRule = {
  name: 'script-test',
  matches: (content, language) => SCRIPT_TAGS.includes(tag(language)) && /\b(?:describe|it|test)\s*\(\s*['"`]/.test(content) && /\bexpect\s*\(/.test(content),
  filename: (_content, language) => (isTypeScript(language) ? 'app.test.ts' : 'app.test.js'),
};

export const fastApiRule: DetectionRule = {
  name: 'fastapi-app',
  matches: (content, language) => PYTHON_TAGS.includes(tag(language)) && (/^\s*from fastapi import\b/m.test(content) || /\bFastAPI\s*\(/.test(content)),
  filename: () => 'app.py',
};

export const flaskMainRule: DetectionRule = {
  name: 'flask-main',
  matches: (content, language) => PYTHON_TAGS.includes(tag(language)) && /if __name__ == ['"]__main__['"]/.test(content) && /\bapp\.run\s*\(/.test(content),
  filename: () => 'main.py',
};

export const expressRule: DetectionRule = {
  name: 'express-app',
  matches: (content, language) => SCRIPT_TAGS.includes(tag(language)) && /require\(\s*['"]express['"]\s*\)|from\s+['"]express['"]/.test(content),
  filename: (_content, language) => (isTypeScript(language) ? 'app.ts' : 'app.js'),
};

export const requirementsRule: DetectionRule = {
  name: 'requirements-manifest',
  matches: (content, language) => {
    if (!MANIFEST_TAGS.includes(tag(language))) return false;
    const lines = content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== '' && !line.startsWith('#'));
    if (lines.length === 0) return false;

    let pinned = false;
    let known = false;
    for (const line of lines) {
      const match = REQUIREMENT_LINE.exec(line);
      if (!match) return false;
      if (match[3]) pinned = true;
      if (KNOWN_PACKAGES.has((match[1] ?? '').toLowerCase())) known = true;
    }
    return pinned || known;
  },
  filename: () => 'requirements.txt',
};

export const dockerfileRule: DetectionRule = {
  name: 'dockerfile',
  matches: (content, language) => {
    if (['dockerfile', 'docker'].includes(tag(language))) return true;
    if (tag(language) !== '') return false;
    return /^FROM\s+\S+/.test(content) && /^(?:RUN|CMD|COPY|ENTRYPOINT)\s/m.test(content);
  },
  filename: () => 'Dockerfile',
};

/** Test signatures come first so a test importing the app is not named after it */
export const DETECTION_RULES: readonly DetectionRule[] = [pytestRule, scriptTestRule, fastApiRule, flaskMainRule, expressRule, requirementsRule, dockerfileRule];

export function detectFilename(content: string, language: string | undefined, rules: readonly DetectionRule[] = DETECTION_RULES): string | undefined {
  const rule = rules.find((r) => r.matches(content, language));
  return rule?.filename(content, language);
}
