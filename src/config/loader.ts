import { type BreathscoreConfig, type PartialConfig, isCompleteConfig, validateConfig } from './schema.js';
import { getDefaultConfig } from './defaults.js';
import { formatValidationErrors } from '../engine/errors.js';
import { getLogger } from '../observability/logger.js';
import { isRecord, type JsonRecord } from '../utils/fields.js';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';

// Search order: CLI flags > env vars > config file > defaults
export interface LoadConfigOptions {
  cliFlags?: PartialConfig;
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export const CONFIG_FILE_CANDIDATES = [
  'breathscore.config.js',
  'breathscore.config.mjs',
  '.breathscorerc',
  '.breathscorerc.json',
] as const;

export async function loadConfig(options: LoadConfigOptions = {}): Promise<BreathscoreConfig> {
  const defaults = getDefaultConfig();
  const envConfig = loadEnvConfig(options.env ?? process.env);
  const fileConfig = await loadFileConfig(options.configPath, options.cwd);

  // Merge in precedence order
  const merged: JsonRecord = {
    ...defaults,
    ...fileConfig,
    ...envConfig,
    ...options.cliFlags,
  };

  if (!isCompleteConfig(merged)) {
    throw new Error(`Invalid configuration: ${formatValidationErrors(validateConfig(merged))}`);
  }

  return merged;
}

// Values are left raw so validation reports bad ones by key
function loadEnvConfig(env: NodeJS.ProcessEnv): JsonRecord {
  const config: JsonRecord = {};

  if (env['BREATHSCORE_LOG_LEVEL']) {
    config['logLevel'] = env['BREATHSCORE_LOG_LEVEL'];
  }
  if (env['BREATHSCORE_JSON']) {
    config['json'] = env['BREATHSCORE_JSON'] === 'true' || env['BREATHSCORE_JSON'] === '1';
  }
  if (env['BREATHSCORE_SCORE_THRESHOLD']) {
    config['scoreThreshold'] = Number(env['BREATHSCORE_SCORE_THRESHOLD']);
  }

  return config;
}

// Load from config file
// Search: breathscore.config.js, breathscore.config.mjs, .breathscorerc, .breathscorerc.json, package.json#breathscore
async function loadFileConfig(configPath?: string, cwd?: string): Promise<JsonRecord> {
  const searchDir = cwd ?? process.cwd();

  // If explicit path provided, use it
  if (configPath) {
    return loadConfigFile(path.resolve(searchDir, configPath));
  }

  for (const candidate of CONFIG_FILE_CANDIDATES) {
    const fullPath = path.join(searchDir, candidate);
    if (fs.existsSync(fullPath)) {
      return loadConfigFile(fullPath);
    }
  }

  // Check package.json#breathscore
  const pkgPath = path.join(searchDir, 'package.json');
  if (fs.existsSync(pkgPath)) {
    try {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
      if (isRecord(pkg) && pkg['breathscore'] !== undefined) {
        return asConfigObject(pkg['breathscore'], `${pkgPath}#breathscore`);
      }
    } catch (error) {
      // A broken package.json belongs to the surrounding project, not to us
      getLogger().debug('Skipping unreadable package.json', { path: pkgPath, error: String(error) });
    }
  }

  return {};
}

function asConfigObject(value: unknown, source: string): JsonRecord {
  if (!isRecord(value)) {
    throw new Error(`Invalid configuration: ${source} must contain an object`);
  }
  return value;
}

async function loadConfigFile(filePath: string): Promise<JsonRecord> {
  const ext = path.extname(filePath);

  if (ext === '.js' || ext === '.mjs') {
    // Convert to file URL for proper ESM import
    const fileUrl = pathToFileURL(filePath).href;
    const module: unknown = await import(fileUrl);
    const exported = isRecord(module) && module['default'] !== undefined ? module['default'] : module;
    return asConfigObject(exported, filePath);
  }

  // JSON or .breathscorerc (treat as JSON)
  const content = fs.readFileSync(filePath, 'utf-8');
  return asConfigObject(JSON.parse(content), filePath);
}
