import type { WorkflowState } from '../orchestrator/states';
import { isTestFilename } from '../extraction/extractor';
import { looksLikeWebApp } from './prompts/planning';

export function fallbackPlan(requirements: string): string {
  const kind = looksLikeWebApp(requirements) ? 'FastAPI web application' : 'Python script';
  return [`Create a ${kind} for: ${requirements.trim() || '(unspecified requirement)'}`, '', 'Files: main module, requirements.txt if needed, pytest tests.'].join('\n');
}

const FASTAPI_APP = `\`\`\`python
# File: app.py
from fastapi import FastAPI

app = FastAPI()


@app.get("/")
def hello_world():
    return {"message": "Hello, World!"}


if __name__ == "__main__":
    import uvicorn
    uvicorn.run(app, host="0.0.0.0", port=8000)
\`\`\`

\`\`\`text
# File: requirements.txt
fastapi
uvicorn
\`\`\``;

const SCRIPT_APP = `\`\`\`python
# File: main.py
def main():
    print("Hello, World!")
    return True


if __name__ == "__main__":
    main()
\`\`\``;

export function fallbackCode(requirements: string): string {
  return requirements.toLowerCase().includes('fastapi') ? FASTAPI_APP : SCRIPT_APP;
}

/**
 * Smoke tests over what the coder produced: every file exists and every
 * python module imports.
 */
export function fallbackTests(state: Readonly<WorkflowState>): string {
  const files = state.filesCreated.filter((name) => !isTestFilename(name));
  const modules = files.filter((name) => /^[A-Za-z_]\w*\.py$/.test(name)).map((name) => name.slice(0, -3));

  const lines = ['import importlib', 'import os', '', '', 'def test_files_exist():', `    for name in ${JSON.stringify(files)}:`, '        assert os.path.exists(name), name'];
  for (const module of modules) {
    lines.push('', '', `def test_import_${module}():`, `    importlib.import_module(${JSON.stringify(module)})`);
  }

  return ['```python', '# File: test_main.py', ...lines, '```'].join('\n');
}

export function fallbackReview(state: Readonly<WorkflowState>, testPassThreshold: number): string {
  const coverage = state.metrics.testCoverage ?? 0;
  if (coverage > testPassThreshold) {
    return `Automated review unavailable; tests pass with ${coverage}% coverage.\nVerdict: APPROVED`;
  }
  return `Automated review unavailable; tests have not passed (${coverage}% coverage).\nVerdict: NEEDS_REVISION`;
}
