export { ConfigManager, DEFAULT_CONFIG } from './config_manager';
export { ConfigurationError } from './errors';
export type { IConfigManager, RosterConfig, ResolvedRosterConfig } from './config_manager.types';
