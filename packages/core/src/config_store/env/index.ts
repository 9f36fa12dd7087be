export { EnvConfigStore, ENV_KEYS } from './env_config_store';
export type { EnvMap } from './env_config_store';
