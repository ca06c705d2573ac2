export * from './schema.js'
export { ConfigLoader, createConfigLoader, DEFAULT_CONFIG_FILENAME, type LoaderOptions } from './loader.js'
