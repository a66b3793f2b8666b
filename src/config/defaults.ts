import type { Config } from './validator';

export const defaults: Config = {
  llm: {
    base_url: 'http://localhost:11434/v1',
    api_key: 'ollama',
    model: 'llama3',
    timeout_ms: 120000,
    max_retries: 3,
  },
  agents: {
    planner: { max_tokens: 1000, temperature: 0.2 },
    coder: { max_tokens: 2500, temperature: 0.1 },
    tester: { max_tokens: 2000, temperature: 0.1 },
    reviewer: { max_tokens: 1500, temperature: 0.1 },
  },
  workflow: {
    max_coder_tester_retries: 3,
    max_reviewer_retries: 5,
    max_steps: 50,
    test_pass_threshold: 80,
    review_approval_threshold: 70,
    max_error_context: 2,
    default_language: 'python',
  },
  workspace: {
    root: 'workspace',
    checkpoint_dir: '.codeloop',
  },
  commands: {
    python: 'python',
    test_args: ['-v'],
    timeout_ms: 300000,
  },
};
