// Interface only. Implementations:
// - @roster/core/memory -> MemoryConfigStore
// - EnvConfigStore from this package's root export
export type { ConfigStore } from './config_store';
export { EnvConfigStore, ENV_KEYS } from './env/env_config_store';
export type { EnvMap } from './env/env_config_store';
