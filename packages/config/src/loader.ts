import * as fs from 'node:fs';
import * as path from 'node:path';
import { type ConfigFileSchema, type ConfigSchema, configFileSchema, configSchema } from './config';
import { type EnvSchema, envSchema } from './env';

const DEFAULT_CONFIG_DIR = process.env.PBR_CONFIG_DIR ?? path.resolve(process.cwd(), 'config');
const DEFAULT_CONFIG_PATH = path.join(DEFAULT_CONFIG_DIR, 'config.json');
const DEFAULT_ENV_PATH = path.join(DEFAULT_CONFIG_DIR, '.env');

export interface LoadOptions {
  configPath?: string;
  envPath?: string;
  skipEnv?: boolean;
}

export interface LoadedConfig {
  config: ConfigSchema;
  env: EnvSchema;
}

interface LoadEnvOptions {
  envPath?: string;
  skipEnv?: boolean;
}

interface IssueLike {
  readonly path: ReadonlyArray<PropertyKey>;
  readonly message: string;
}

export function loadConfig(options: LoadOptions = {}): LoadedConfig {
  const { configPath = DEFAULT_CONFIG_PATH, envPath = DEFAULT_ENV_PATH, skipEnv = false } = options;

  const configFile = loadConfigFile(configPath);
  const env = loadEnv({ envPath, skipEnv });

  const mergedConfig = mergeConfig(configFile, env);
  const result = configSchema.safeParse(mergedConfig);

  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${formatZodIssues(result.error.issues)}`);
  }

  return {
    config: result.data,
    env,
  };
}

/**
 * Reads and validates config.json. Every section has defaults, so a missing file
 * yields the default configuration.
 */
export function loadConfigFile(configPath: string = DEFAULT_CONFIG_PATH): ConfigFileSchema {
  let rawConfig: unknown = {};

  if (fs.existsSync(configPath)) {
    const configContent = fs.readFileSync(configPath, 'utf-8');
    try {
      rawConfig = JSON.parse(configContent);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Configuration file is not valid JSON: ${configPath} (${reason})`, { cause: error });
    }
  }

  const result = configFileSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new Error(`Configuration file validation failed:\n${formatZodIssues(result.error.issues)}`);
  }

  return result.data;
}

export function loadEnv(options: LoadEnvOptions = {}): EnvSchema {
  const { envPath = DEFAULT_ENV_PATH, skipEnv = false } = options;
  const keys = Object.keys(envSchema.shape);
  const fileVars = skipEnv ? {} : pickKeys(readEnvFile(envPath), keys);
  const processVars = pickKeys(process.env, keys);
  const mergedEnv = { ...fileVars, ...processVars };

  const result = envSchema.safeParse(mergedEnv);

  if (!result.success) {
    throw new Error(`.env validation failed:\n${formatZodIssues(result.error.issues)}`);
  }

  return result.data;
}

function readEnvFile(envPath: string): Record<string, string> {
  if (!fs.existsSync(envPath)) {
    return {};
  }

  const content = fs.readFileSync(envPath, 'utf-8');
  return parseEnvContent(content);
}

export function parseEnvContent(content: string): Record<string, string> {
  const envVars: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const equalsIndex = trimmed.indexOf('=');
    if (equalsIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, equalsIndex).trim();
    let value = trimmed.slice(equalsIndex + 1).trim();

    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }

    envVars[key] = value;
  }

  return envVars;
}

// Other variables may share the file or the environment; only ours are validated.
function pickKeys(source: Record<string, string | undefined>, keys: string[]): Record<string, string> {
  const envVars: Record<string, string> = {};

  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'string') {
      envVars[key] = value;
    }
  }

  return envVars;
}

function mergeConfig(configFile: ConfigFileSchema, env: EnvSchema): ConfigSchema {
  return {
    ...configFile,
    telemetry: {
      ...configFile.telemetry,
      logLevel: env.LOG_LEVEL ?? configFile.telemetry.logLevel,
    },
    credentials: {
      accessToken: env.PUSHBULLET_ACCESS_TOKEN,
      encryptionPassword: env.PUSHBULLET_ENCRYPTION_PASSWORD,
    },
  };
}

function formatZodIssues(issues: ReadonlyArray<IssueLike>): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.map((segment) => String(segment)).join('.') : '<root>';
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

export function validateConfig(config: unknown): config is ConfigSchema {
  const result = configSchema.safeParse(config);
  return result.success;
}
