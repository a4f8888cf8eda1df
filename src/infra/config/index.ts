export {
  EnvSchema,
  parseEnv,
  createConfig,
  DEFAULT_TEMPLATE_PATH,
  DEFAULT_OUTPUT_PATH,
  DEFAULT_LOOKUP_URL_BASE,
  type Env,
  type AppConfig,
} from './env.js';

export { parseCliArgs, USAGE, type CliArgs } from './cli.js';
