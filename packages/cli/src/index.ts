/**
 * @refsync/cli - CLI for refsync
 */

export {
  runSync,
  createNotionTable,
  describeFatalError,
  EXIT_CODES,
  type SyncRunOutcome,
  type TableFactory,
  type FatalErrorReport,
} from "./runner.js";
export {
  loadConfigFile,
  parseConfig,
  expandEnvironmentVariables,
  hasUnresolvedReference,
} from "./parser.js";
export {
  resolveConfigDir,
  defaultEnvFilePath,
  formatCredentials,
  parseCredentials,
  loadCredentials,
  saveCredentials,
  maskSecret,
  type StoredCredentials,
} from "./credentials.js";
export { resolveSettings } from "./settings.js";
export {
  ENV_KEYS,
  DEFAULT_THROTTLE,
  type ConfigFile,
  type NotionConfigRaw,
  type ThrottleConfigRaw,
  type SyncFlags,
  type SyncSettings,
} from "./config.js";
