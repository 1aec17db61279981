import { join } from 'path';
import * as yaml from 'js-yaml';
import type { OutputFormat, XcgraphConfig } from '../types/index.js';
import { CONFIG_DEFAULTS, ENV_VARS, FILE_PATTERNS } from '../constants/index.js';
import { exists, readTextFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Configuration for the xcgraph CLI.
 *
 * Defaults, overridden by `.xcgraph.yml` in the working directory,
 * overridden by environment variables.
 */

const DEFAULT_CONFIG: XcgraphConfig = {
  swiftVersion: CONFIG_DEFAULTS.SWIFT_VERSION,
  format: CONFIG_DEFAULTS.FORMAT,
};

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'yaml'];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

export async function loadConfig(
  cwd: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<XcgraphConfig> {
  const configPath = join(cwd, FILE_PATTERNS.CONFIG_FILE);
  let config: XcgraphConfig = { ...DEFAULT_CONFIG };

  if (await exists(configPath)) {
    logger.debug(`Loading config from: ${configPath}`);
    config = { ...config, ...parseConfigFile(await readTextFile(configPath), configPath) };
  }

  const descriptionPath = env[ENV_VARS.DESCRIPTION_PATH];
  if (descriptionPath) {
    config.descriptionLibraryPath = descriptionPath;
  }

  return config;
}

function parseConfigFile(content: string, configPath: string): Partial<XcgraphConfig> {
  let raw: unknown;
  try {
    raw = yaml.load(content, { filename: configPath });
  } catch (error) {
    throw new ConfigError(`Failed to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (raw === undefined || raw === null) {
    return {};
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(`${configPath} must contain a mapping`);
  }

  const result: Partial<XcgraphConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'swiftVersion':
        if (typeof value !== 'string' && typeof value !== 'number') {
          throw new ConfigError(`${configPath}: swiftVersion must be a string`);
        }
        result.swiftVersion = String(value);
        break;
      case 'descriptionLibraryPath':
        if (typeof value !== 'string') {
          throw new ConfigError(`${configPath}: descriptionLibraryPath must be a string`);
        }
        result.descriptionLibraryPath = value;
        break;
      case 'format':
        if (!isOutputFormat(value)) {
          throw new ConfigError(`${configPath}: format must be one of ${OUTPUT_FORMATS.join(', ')}`);
        }
        result.format = value;
        break;
      default:
        logger.warn(`Ignoring unknown config key '${key}' in ${configPath}`);
    }
  }
  return result;
}
