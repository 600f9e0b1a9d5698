export * from './types';
export * from './utils';
export * from './api';
export { loadConfig, DEFAULT_GIVEAWAY_CONFIG, type GiveawayConfig, type LoadedConfig } from './config';
