import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { ZodError } from 'zod';
import {
  SwitchboardConfigSchema,
  DEFAULT_CONFIG,
  type SwitchboardConfig,
} from '../../types/config.js';
import { ConfigError } from '../../core/errors.js';

export const CONFIG_FILENAME = '.switchboard.yaml';
export const STATE_DIR = '.switchboard';

/**
 * Find the project root by looking for .switchboard.yaml, .switchboard/
 * or, failing those, .git
 */
export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;

  while (currentDir !== dirname(currentDir)) {
    if (
      existsSync(join(currentDir, CONFIG_FILENAME)) ||
      existsSync(join(currentDir, STATE_DIR)) ||
      existsSync(join(currentDir, '.git'))
    ) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return null;
}

export function isInitialized(projectRoot: string): boolean {
  return existsSync(join(projectRoot, CONFIG_FILENAME));
}

/**
 * Parse and validate configuration text. `${VAR}` references are
 * replaced from `env`; unset variables become empty strings and are
 * reported through onWarning.
 *
 * @throws ConfigError on invalid YAML or schema violations
 */
export function parseConfig(
  content: string,
  env: NodeJS.ProcessEnv = process.env,
  onWarning?: (message: string) => void
): SwitchboardConfig {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to load config: ${detail}`);
  }

  const interpolated = interpolateEnvVars(raw ?? {}, env, onWarning);

  try {
    return SwitchboardConfigSchema.parse(interpolated);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Failed to load config: ${issues.join('; ')}`);
    }
    throw error;
  }
}

/**
 * Load .switchboard.yaml from the project root, or the defaults when it
 * does not exist
 */
export function loadConfig(
  projectRoot: string,
  onWarning?: (message: string) => void
): SwitchboardConfig {
  const configPath = join(projectRoot, CONFIG_FILENAME);

  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  return parseConfig(readFileSync(configPath, 'utf-8'), process.env, onWarning);
}

export function saveConfig(projectRoot: string, config: SwitchboardConfig): void {
  const configPath = join(projectRoot, CONFIG_FILENAME);
  writeFileSync(configPath, stringifyYaml(config, { indent: 2 }), 'utf-8');
}

export function ensureStateDir(projectRoot: string): string {
  const stateDir = join(projectRoot, STATE_DIR);
  if (!existsSync(stateDir)) {
    mkdirSync(stateDir, { recursive: true });
  }
  return stateDir;
}

/**
 * Replace ${VAR_NAME} references in every string value
 */
export function interpolateEnvVars(
  obj: unknown,
  env: NodeJS.ProcessEnv,
  onWarning?: (message: string) => void
): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      const value = env[varName];
      if (value === undefined) {
        onWarning?.(`Environment variable ${varName} is not set`);
        return '';
      }
      return value;
    });
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => interpolateEnvVars(item, env, onWarning));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = interpolateEnvVars(value, env, onWarning);
    }
    return result;
  }

  return obj;
}

export function getSwitchboardPaths(projectRoot: string) {
  return {
    config: join(projectRoot, CONFIG_FILENAME),
    stateDir: join(projectRoot, STATE_DIR),
    issues: join(projectRoot, STATE_DIR, 'issues'),
  };
}
