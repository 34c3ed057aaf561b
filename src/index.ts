/** Library entry point. */
export * from './runner';
export type { LoadedConfig } from './cli/config/load';
export { loadConfig, loadConfigSync } from './cli/config/load';
