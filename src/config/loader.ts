import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { ConfigSchema } from './validator';
import type { Config } from './validator';
import { defaults } from './defaults';
import { ConfigValidationError } from '../agent/errors';
import { parseLogLevel } from '../utils/logger';

/**
 * DeepPartial allows for recursive partials of the Config type.
 * Used for YAML and CLI overrides.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[] ? U[] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export interface LoadConfigOptions {
  /** Directory holding config.yaml and .env (default: process.cwd()) */
  cwd?: string;
  /** Environment to read; when omitted, .env is loaded into process.env first */
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolves configuration in order: defaults, config.yaml, environment,
 * CLI overrides; the merged result is validated with zod.
 * @throws ConfigValidationError when the merged configuration is invalid
 */
export function loadConfig(cliOverrides: DeepPartial<Config> = {}, options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();
  let env = options.env;
  if (!env) {
    dotenv.config({ path: path.join(cwd, '.env') });
    env = process.env;
  }

  // 1. Defaults
  const config: Record<string, unknown> = {};
  deepMerge(config, defaults);

  // 2. config.yaml (if exists)
  const yamlPath = path.join(cwd, 'config.yaml');
  if (fs.existsSync(yamlPath)) {
    const parsedYaml: unknown = YAML.parse(fs.readFileSync(yamlPath, 'utf8'));
    if (isRecord(parsedYaml)) {
      deepMerge(config, parsedYaml);
    } else if (parsedYaml !== null && parsedYaml !== undefined) {
      throw new ConfigValidationError([`${yamlPath}: expected a mapping at the top level`]);
    }
  }

  // 3. Environment variables
  deepMerge(config, {
    llm: {
      api_key: env.LLM_API_KEY,
      base_url: env.LLM_BASE_URL,
      model: env.LLM_MODEL,
      temperature: env.LLM_TEMPERATURE,
    },
    tools: { endpoint: env.TOOLS_ENDPOINT },
    agent: { max_steps: env.AUTOPILOT_MAX_STEPS },
    logging: { level: env.LOG_LEVEL === undefined ? undefined : parseLogLevel(env.LOG_LEVEL) },
  });

  // 4. CLI arguments
  deepMerge(config, cliOverrides);

  // 5. Validate
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`));
  }
  return result.data;
}

/** Copy with secrets masked, for display */
export function maskConfig(config: Config): Config {
  return { ...config, llm: { ...config.llm, api_key: config.llm.api_key ? '********' : undefined } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Simple deep merge for config objects. Undefined source values are skipped
 * so unset environment variables never clear a configured value.
 */
function deepMerge(target: Record<string, unknown>, source: object): void {
  for (const [key, sourceValue] of Object.entries(source)) {
    if (isRecord(sourceValue)) {
      const existing = target[key];
      const nested: Record<string, unknown> = isRecord(existing) ? existing : {};
      target[key] = nested;
      deepMerge(nested, sourceValue);
    } else if (sourceValue !== undefined) {
      target[key] = Array.isArray(sourceValue) ? [...sourceValue] : sourceValue;
    }
  }
}
