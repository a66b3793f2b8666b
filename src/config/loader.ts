import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { ConfigSchema, Config } from './validator';
import { defaults } from './defaults';
import { ConfigError } from '../orchestrator/errors';

/**
 * Recursive partial of Config, used for YAML and programmatic overrides.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[] ? U[] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export interface LoadConfigOptions {
  /** Directory holding `.env` and `codeloop.yaml` (default: process.cwd()) */
  cwd?: string;
  /** Environment to read; when omitted `.env` is loaded into process.env */
  env?: NodeJS.ProcessEnv;
}

export const CONFIG_FILE = 'codeloop.yaml';

/**
 * Resolve configuration: defaults, then codeloop.yaml, then environment
 * variables, then `overrides`. Later layers win key by key.
 * @throws ConfigError listing every validation issue.
 */
export function loadConfig(overrides: DeepPartial<Config> = {}, options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();
  let env = options.env;
  if (!env) {
    dotenv.config({ path: path.join(cwd, '.env') });
    env = process.env;
  }

  // 1. Defaults
  const config: Record<string, unknown> = structuredClone(defaults);

  // 2. codeloop.yaml
  const yamlPath = path.join(cwd, CONFIG_FILE);
  if (fs.existsSync(yamlPath)) {
    const parsedYaml: unknown = YAML.parse(fs.readFileSync(yamlPath, 'utf8'));
    if (isRecord(parsedYaml)) {
      deepMerge(config, parsedYaml);
    } else if (parsedYaml != null) {
      throw new ConfigError([`${CONFIG_FILE} must contain a mapping at the top level`]);
    }
  }

  // 3. Environment variables
  deepMerge(config, {
    llm: {
      base_url: env.CODELOOP_LLM_BASE_URL,
      api_key: env.CODELOOP_LLM_API_KEY,
      model: env.CODELOOP_LLM_MODEL,
    },
    workspace: { root: env.CODELOOP_WORKSPACE },
  });

  // 4. Programmatic overrides
  deepMerge(config, overrides);

  // 5. Validate with Zod
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge for config objects. Undefined source values leave the target
 * untouched; arrays replace.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];

    if (isRecord(sourceValue)) {
      const existing = target[key];
      const nested: Record<string, unknown> = isRecord(existing) ? existing : {};
      target[key] = nested;
      deepMerge(nested, sourceValue);
    } else if (sourceValue !== undefined) {
      target[key] = sourceValue;
    }
  }
}
