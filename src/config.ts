/**
 * Configuration loader.
 *
 * Sources, lowest precedence first: `~/.stepline/stepline.yaml`,
 * `./stepline.yaml` (or an explicit file), then STEPLINE_* environment
 * variables. Only the CLI loads configuration; everything else takes a
 * `StepConfig` argument.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { merge } from 'lodash-es';
import { parse as parseYaml } from 'yaml';
import { ConfigError, formatIssues } from './errors.js';
import { StepConfigSchema, type StepConfig } from './types/config.js';
import { isRecord } from './utils.js';

export const CONFIG_FILE_NAME = 'stepline.yaml';

export interface LoadConfigOptions {
  /** Explicit file used in place of `./stepline.yaml` */
  configFile?: string;
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Environment variable → dotted config path.
 */
const ENV_OVERRIDES: Record<string, string[]> = {
  STEPLINE_ARTIFACT_BUCKET: ['aws', 'artifactBucket'],
  STEPLINE_AWS_REGION: ['aws', 'region'],
  STEPLINE_AWS_ENDPOINT: ['aws', 'endpoint'],
  STEPLINE_IMAGE_REPOSITORY: ['aws', 'imageRepository'],
  STEPLINE_LOG_LEVEL: ['logging', 'level'],
  STEPLINE_BATCH_JOB_QUEUE: ['batch', 'jobQueue'],
  STEPLINE_BATCH_JOB_DEFINITION: ['batch', 'jobDefinition'],
};

/**
 * Read and parse one YAML file. A missing file yields an empty object.
 * @throws ConfigError if the file cannot be read or is not a YAML mapping
 */
export async function readConfigFile(filePath: string, required = false): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf8');
  } catch (error) {
    if (!required && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`Failed to read config from ${filePath}: ${error instanceof Error ? error.message : String(error)}`, {
      file: filePath,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`, {
      file: filePath,
    });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping`, { file: filePath });
  }
  return parsed;
}

export function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const [name, [section, field]] of Object.entries(ENV_OVERRIDES)) {
    const value = env[name];
    if (value === undefined || value === '') {
      continue;
    }
    const existing = overrides[section];
    overrides[section] = { ...(isRecord(existing) ? existing : {}), [field]: value };
  }
  return overrides;
}

/**
 * Validate a raw (already merged) configuration object.
 * @throws ConfigError listing every invalid field
 */
export function parseConfig(raw: unknown, source = 'configuration'): StepConfig {
  const result = StepConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error.issues)}`, {
      issues: result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  return result.data;
}

/**
 * Load the effective configuration.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<StepConfig> {
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? os.homedir();
  const env = options.env ?? process.env;

  const globalConfig = await readConfigFile(path.join(homeDir, '.stepline', CONFIG_FILE_NAME));
  const localConfig = options.configFile
    ? await readConfigFile(path.resolve(cwd, options.configFile), true)
    : await readConfigFile(path.join(cwd, CONFIG_FILE_NAME));

  const merged = merge({}, globalConfig, localConfig, envOverrides(env));
  return parseConfig(merged);
}
