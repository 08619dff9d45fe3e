export * from './config';
export type { EnvSchema } from './env';
export {
  type LoadedConfig,
  type LoadOptions,
  loadConfig,
  loadConfigFile,
  loadEnv,
  parseEnvContent,
  validateConfig,
} from './loader';
