// Path: src/lib/config/index.ts
// Public API for configuration module

// Types
export type {
  ResolverConfig,
  RawConfigInput,
  CommandFailurePolicy,
  WriteMode,
} from './types.js';

export {
  DEFAULT_CONFIG,
  CONFIG_FILE_NAME,
  COMMAND_FAILURE_POLICIES,
  WRITE_MODES,
} from './types.js';

// Loading
export {
  loadConfig,
  normalizeConfigInput,
  parseConfigFileContent,
  readEnvOverrides,
  parsePrefixList,
  type LoadConfigOptions,
} from './loader.js';
