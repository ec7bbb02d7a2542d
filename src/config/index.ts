/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, DEFAULT_IMAGES, deepMerge } from "./defaults";
// Loader
export {
  CONFIG_FILE_NAMES,
  ConfigError,
  createDefaultConfig,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
  parseStructuredContent,
} from "./loader";
// Manifests
export {
  API_VERSION,
  DEFAULT_NAMESPACE,
  DEFAULT_RETENTION_HOURS,
  loadManifests,
  ManifestError,
  parseManifests,
  parsePolicyManifest,
  parsePolicySpec,
  POLICY_KIND,
} from "./manifest";
// Resolver
export { IN_MEMORY_DATABASE, resolvePaths } from "./resolver";
// Validator
export { isRecord, validateConfig } from "./validator";
