export { DEFAULT_CONFIG, DEFAULT_REQUIRED_COLUMNS, loadConfig, parseConfig } from './loadConfig';
export { appConfigSchema, configFileSchema } from './schema';
export type { AppConfig, ConfigOverrides } from './schema';
