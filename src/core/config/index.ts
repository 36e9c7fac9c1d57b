export { loadConfig, type LoadConfigOptions, CONFIG_FILENAMES } from './load'
export { default as validateConfig } from './validate'
export { ConfigLoadError, ConfigValidationError } from './errors'
