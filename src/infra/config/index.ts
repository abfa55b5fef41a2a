export {
  EnvSchema,
  DEFAULT_REGISTRATIONS_FILE,
  parseEnv,
  createConfig,
  type Env,
  type AppConfig,
} from './env.js';
