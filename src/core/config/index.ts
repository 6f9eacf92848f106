export { DEFAULT_CONFIG, MANN_WHITNEY_EXACT_LIMIT, resolveConfig, configFromEnv } from './EngineConfig';
export type { EngineConfig } from './EngineConfig';
