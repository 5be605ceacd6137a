export * from './config';
export { type EnvSchema, envSchema } from './env';
export {
  type LoadedConfig,
  type LoadOptions,
  loadConfig,
  loadConfigFile,
  loadEnv,
  formatZodIssues,
  parseEnvContent,
} from './loader';
