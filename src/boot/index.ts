export { initialize, resolveConfig, APP_VERSION } from './init';
export { default as CONFIG, USER_CONFIG, APP_CONSTANTS, loadConfig, loadEnvFile } from './config';
export type { ConfigEnv } from './config';
export type { App, InitOptions } from './types';
