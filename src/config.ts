/**
 * Configuration module.
 *
 * Loads config from dataConfig/config.{WORDHOARD_CONFIG}.json (relative to the
 * working directory) and merges it over built-in defaults.
 */

import fs from 'fs-extra';
import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULT_INPUT_ENCODINGS } from './loader.js';
import { ConfigurationError } from './errors.js';

// New Oxford American Dictionary as shipped with macOS
export const NOAD_PATH = '/System/Library/AssetsV2/'
  + 'com_apple_MobileAsset_DictionaryServices_dictionaryOSX/'
  + '4094df88727a054b658681dfb74f23702d3c985e.asset/'
  + 'AssetData/'
  + 'New Oxford American Dictionary.dictionary/'
  + 'Contents/Resources/Body.data';

const ConfigFileSchema = z.object({
  dictionaryPath: z.string().min(1),
  cacheFile: z.string().min(1).nullable(),
  port: z.number().int().positive(),
  inputEncodings: z.array(z.string().min(1)).min(1)
}).partial();

export interface AppConfig {
  /** Body.data container used when none is given */
  dictionaryPath: string;
  /** JSON file memoizing parsed containers; null disables caching */
  cacheFile: string | null;
  /** HTTP port for `serve` */
  port: number;
  /** Encodings tried when reading a book */
  inputEncodings: string[];
}

export const DEFAULT_CONFIG: AppConfig = {
  dictionaryPath: NOAD_PATH,
  cacheFile: 'cache/dictionaries.json',
  port: 3000,
  inputEncodings: DEFAULT_INPUT_ENCODINGS
};

export interface ConfigOptions {
  /** Directory holding config.*.json (default: ./dataConfig) */
  configDir?: string;
  /** Environment to read variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration. A missing file means defaults; an invalid one is an error.
 */
export async function loadConfig(options: ConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const configDir = options.configDir ?? path.join(process.cwd(), 'dataConfig');
  const configName = env.WORDHOARD_CONFIG ?? 'default';
  const configPath = path.join(configDir, `config.${configName}.json`);

  let fileConfig: z.infer<typeof ConfigFileSchema> = {};
  if (await fs.pathExists(configPath)) {
    let raw: unknown;
    try {
      raw = await fs.readJson(configPath);
    } catch (err) {
      throw new ConfigurationError(`Invalid config ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid config ${configPath}: ${parsed.error.message}`);
    }
    fileConfig = parsed.data;
  } else {
    console.warn(`Config file ${configPath} not found, using defaults`);
  }

  const config: AppConfig = { ...DEFAULT_CONFIG, ...fileConfig };

  if (env.PORT) {
    const port = parseInt(env.PORT, 10);
    if (!isNaN(port) && port > 0) {
      config.port = port;
    }
  }

  return config;
}

/**
 * Encodings to try on a book: the one given on the command line, else the configured list.
 */
export function inputEncodingsFor(config: AppConfig, explicit?: string): string[] {
  return explicit ? [explicit] : config.inputEncodings;
}
