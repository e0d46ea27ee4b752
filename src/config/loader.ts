import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { DefinitionError, errorMessage } from '../errors.js';
import {
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRIES,
  DEFAULT_TIMEOUT_MS,
} from '../executor/http.js';
import { ProjectConfigSchema, type ProjectConfig, type Settings } from '../types/index.js';
import { interpolateTree, type Environment } from './interpolate.js';

export const CONFIG_FILENAME = 'cifcheck.config.yaml';
export const API_URL_ENV = 'CIFCHECK_API_URL';
export const DEFAULT_API_URL = 'http://localhost:11000';
export const DEFAULT_TEST_LOCATION = 'cmd_tests';
export const DEFAULT_DEBUG_DIR = 'logs';

/**
 * Find config file by walking up from cwd
 */
function findConfigFile(startDir: string): string | null {
  let dir = startDir;
  while (true) {
    const configPath = resolve(dir, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      return configPath;
    }
    const parentDir = dirname(dir);
    if (parentDir === dir) {
      return null;
    }
    dir = parentDir;
  }
}

export interface LoadConfigOptions {
  /** Explicit config path; must exist */
  configPath?: string;
  cwd?: string;
  env?: Environment;
}

export interface LoadConfigResult {
  config: ProjectConfig;
  configPath: string;
}

/**
 * Load and validate the project config. The file is optional: without an
 * explicit path and with none found, null is returned.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadConfigResult | null {
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath ? resolve(cwd, options.configPath) : findConfigFile(cwd);

  if (!configPath) {
    return null;
  }
  if (!existsSync(configPath)) {
    throw new DefinitionError(`Config file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new DefinitionError(`Invalid config file ${configPath}: ${errorMessage(error)}`);
  }

  const { value, missing } = interpolateTree(raw ?? {}, options.env ?? process.env);
  if (missing.length > 0) {
    throw new DefinitionError(
      `Config file ${configPath} uses unset environment variables: ${missing.join(', ')}`
    );
  }

  const result = ProjectConfigSchema.safeParse(value);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
      .join('\n');
    throw new DefinitionError(`Invalid config file ${configPath}:\n${errors}`);
  }

  return {
    config: result.data,
    configPath,
  };
}

/**
 * Values given on the command line
 */
export interface SettingsFlags {
  apiUrl?: string;
  testLocation?: string;
  /** true for the default directory, a path, or undefined when off */
  debug?: string | boolean;
}

const ApiUrlSchema = z.string().url();

/**
 * Resolve run settings once: flag > environment > config file > default.
 * Paths from the config file are relative to the file; others to cwd.
 */
export function resolveSettings(
  flags: SettingsFlags,
  env: Environment,
  loaded: LoadConfigResult | null,
  cwd: string = process.cwd()
): Settings {
  const config = loaded?.config;
  const configDir = loaded ? dirname(loaded.configPath) : cwd;

  const apiUrl = flags.apiUrl ?? nonEmpty(env[API_URL_ENV]) ?? config?.api.url ?? DEFAULT_API_URL;
  if (!ApiUrlSchema.safeParse(apiUrl).success) {
    throw new DefinitionError(`Invalid API URL: ${apiUrl}`);
  }

  const testLocation = flags.testLocation
    ? resolve(cwd, flags.testLocation)
    : config?.tests
      ? resolve(configDir, config.tests)
      : resolve(cwd, DEFAULT_TEST_LOCATION);

  let debugDir: string | undefined;
  if (typeof flags.debug === 'string') {
    debugDir = resolve(cwd, flags.debug);
  } else if (flags.debug) {
    debugDir = config?.debug_dir ? resolve(configDir, config.debug_dir) : resolve(cwd, DEFAULT_DEBUG_DIR);
  }

  return {
    apiUrl,
    headers: config?.api.headers ?? {},
    timeoutMs: config?.api.timeout_ms ?? DEFAULT_TIMEOUT_MS,
    requestTimeoutMs: config?.api.request_timeout_ms ?? DEFAULT_REQUEST_TIMEOUT_MS,
    pollIntervalMs: config?.api.poll_interval_ms ?? DEFAULT_POLL_INTERVAL_MS,
    retries: config?.api.retries ?? DEFAULT_RETRIES,
    testLocation,
    debugDir,
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.length > 0 ? value : undefined;
}
